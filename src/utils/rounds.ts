import { EmbedBuilder } from "discord.js";
import type { BotContext } from "../commands/base";
import { resultEmbed } from "./embeds";
import { scheduleRoundClose } from "./scheduler";

/** The part of the discord client the round lifecycle needs. */
export interface RoundClient {
    user: { id: string } | null;
    channels: { fetch(id: string): Promise<unknown> };
}

interface SendableChannel {
    send(options: { embeds: EmbedBuilder[] }): Promise<unknown>;
}

function isSendable(ch: unknown): ch is SendableChannel {
    return typeof ch === "object" && ch !== null && "send" in ch && typeof ch.send === "function";
}

/**
 * Schedules the automatic close when AUTO_CLOSE is on and the round is running.
 * Returns the delay in ms, or null when nothing was armed.
 */
export function armAutoClose(client: RoundClient, ctx: BotContext): number | null {
    if (!ctx.config.autoClose) return null;
    const delay = scheduleRoundClose(ctx.service.view(), async () => {
        // closing is open to anyone, the bot closes as itself
        const closer = client.user?.id ?? ctx.config.adminId;
        const prize = await ctx.service.closeRound(closer);
        console.log(`Voting closed automatically, prize ${prize} wei`);
        await announceResult(client, ctx, prize);
    });
    if (delay !== null) console.log(`Voting will close automatically in ${Math.round(delay / 1000)}s`);
    return delay;
}

export async function announceResult(client: RoundClient, ctx: BotContext, prize: bigint) {
    if (!ctx.config.announceChannelId) return;
    try {
        const ch = await client.channels.fetch(ctx.config.announceChannelId);
        if (!isSendable(ch)) {
            console.warn(`ANNOUNCE_CHANNEL_ID ${ctx.config.announceChannelId} is not a text channel`);
            return;
        }
        await ch.send({ embeds: [resultEmbed(ctx.service.view(), prize)] });
    } catch (err) {
        console.error("Failed to post results:", err);
    }
}
