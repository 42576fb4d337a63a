import http from "http";
import { Client, Events, GatewayIntentBits, REST, Routes } from "discord.js";
import { commandCollection } from "./commands";
import type { BotContext } from "./commands/base";
import { BotConfig, loadConfigFromDotenv } from "./config";
import { onInteractionCreate } from "./events/interactionCreate";
import { onReady } from "./events/ready";
import { createLedgerStore } from "./utils/db";
import { LedgerService } from "./utils/ledgerService";
import { cancelRoundClose } from "./utils/scheduler";

async function main(config: BotConfig) {
    const store = createLedgerStore(config);
    const service = await LedgerService.open(store, { administrator: config.adminId, voteSecret: config.voteSecret });
    const ctx: BotContext = { service, config };
    const commands = commandCollection();

    const client = new Client({ intents: [GatewayIntentBits.Guilds] });
    client.once(Events.ClientReady, (c) => {
        onReady(c, ctx).catch((err) => console.error("ready handler failed:", err));
    });
    client.on(Events.InteractionCreate, (interaction) => {
        onInteractionCreate(interaction, ctx, commands).catch((err) => console.error("interaction handler failed:", err));
    });

    await client.login(config.token);

    // register commands only if CLIENT_ID is set; otherwise warn but continue
    if (!config.clientId) {
        console.warn("CLIENT_ID not set, skipping global command registration.");
    } else {
        const rest = new REST({ version: "10" }).setToken(config.token);
        try {
            console.log("Registering application commands...");
            await rest.put(Routes.applicationCommands(config.clientId), {
                body: commands.map((command) => command.data.toJSON()),
            });
            console.log("Commands registered.");
        } catch (err) {
            console.error("Failed to register commands:", err);
        }
    }

    // Small HTTP health + readiness server so hosts that expect a bound port succeed
    let shuttingDown = false;

    const server = http.createServer((req, res) => {
        // readiness endpoint: return 200 only if bot is logged in and not shutting down
        if (req.url === "/healthz") {
            const isReady = client.isReady() && !shuttingDown;
            const view = service.view();
            res.writeHead(isReady ? 200 : 503, { "Content-Type": "application/json" });
            res.end(
                JSON.stringify({
                    status: isReady ? "ok" : "starting",
                    uptime: process.uptime(),
                    ts: new Date().toISOString(),
                    botUser: client.user ? client.user.tag : null,
                    ledger: { id: view.id, phase: view.phase, votes: view.totalVotes },
                }) + "\n",
            );
            return;
        }

        res.writeHead(200, { "Content-Type": "text/plain" });
        res.end(shuttingDown ? "Shutting down\n" : "OK\n");
    });

    server.listen(config.port, () => {
        console.log(`HTTP health server listening on port ${config.port}`);
    });

    // graceful shutdown: stop accepting new requests, wait for inflight tasks, then destroy client
    const shutdown = async () => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log("Shutting down...");
        cancelRoundClose();

        server.close(() => {
            console.log("HTTP server closed");
        });

        console.log(`Waiting ${config.shutdownGraceMs}ms for in-flight work to finish...`);
        await new Promise((resolve) => setTimeout(resolve, config.shutdownGraceMs));

        try {
            await client.destroy();
            console.log("Discord client destroyed");
        } catch (e) {
            console.error("Error destroying Discord client:", e);
        }

        process.exit(0);
    };

    process.on("SIGINT", () => void shutdown());
    process.on("SIGTERM", () => void shutdown());
}

// log unhandled errors so host logs show cause
process.on("uncaughtException", (err) => {
    console.error("uncaughtException:", err);
});
process.on("unhandledRejection", (reason) => {
    console.error("unhandledRejection:", reason);
});

try {
    const config = loadConfigFromDotenv();
    main(config).catch((err) => {
        console.error("Failed to start:", err);
        process.exit(1);
    });
} catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
}
