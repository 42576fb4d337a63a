import path from "path";
import dotenv from "dotenv";

export interface BotConfig {
    token: string;
    clientId?: string;
    adminId: string;
    announceChannelId?: string;
    autoClose: boolean;
    dbPath: string;
    supabaseUrl?: string;
    supabaseServiceKey?: string;
    voteSecret: string;
    port: number;
    shutdownGraceMs: number;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

const DEFAULT_DB_PATH = path.join(__dirname, "../data/vote-ledger.json");

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
    const token = env.DISCORD_TOKEN;
    if (!token) throw new ConfigError("DISCORD_TOKEN is required in .env");
    const adminId = env.ADMIN_ID;
    if (!adminId) throw new ConfigError("ADMIN_ID is required in .env");

    return {
        token,
        clientId: env.CLIENT_ID || undefined,
        adminId,
        announceChannelId: env.ANNOUNCE_CHANNEL_ID || undefined,
        autoClose: env.AUTO_CLOSE === "true",
        dbPath: env.DB_PATH || DEFAULT_DB_PATH,
        supabaseUrl: env.SUPABASE_URL || undefined,
        supabaseServiceKey: env.SUPABASE_SERVICE_KEY || undefined,
        voteSecret: env.VOTE_SECRET || "CHANGE_THIS_IN_ENV",
        port: Number(env.PORT) || 3000,
        shutdownGraceMs: Number(env.SHUTDOWN_GRACE_MS) || 10000,
    };
}

/** Reads .env into process.env, then parses it. */
export function loadConfigFromDotenv(): BotConfig {
    dotenv.config();
    return loadConfig(process.env);
}
