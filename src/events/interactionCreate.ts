import { ChatInputCommandInteraction, Collection, Interaction } from "discord.js";
import type { BotContext, Command } from "../commands/base";
import { isLedgerError, TransferError } from "../utils/ledger/errors";

export function describeError(err: unknown) {
    if (isLedgerError(err)) return `❌ ${err.message}`;
    if (err instanceof TransferError) return `❌ Payout failed: ${err.message}`;
    return "There was an error executing that command.";
}

async function replyError(interaction: ChatInputCommandInteraction, content: string) {
    try {
        if (interaction.deferred || interaction.replied) await interaction.editReply({ content, embeds: [] });
        else await interaction.reply({ content, ephemeral: true });
    } catch (e) {
        console.error("Failed to report command error:", e);
    }
}

export async function onInteractionCreate(
    interaction: Interaction,
    ctx: BotContext,
    commands: Collection<string, Command>,
) {
    if (!interaction.isChatInputCommand()) return;

    const command = commands.get(interaction.commandName);
    if (!command) {
        await interaction.reply({ content: "Command not found.", ephemeral: true });
        return;
    }
    try {
        await command.execute(interaction, ctx);
    } catch (err) {
        // ledger rejections get a one-line log, no stack
        if (isLedgerError(err)) console.log(`/${interaction.commandName} by ${interaction.user.id} rejected: ${err.code}`);
        else console.error(err);
        await replyError(interaction, describeError(err));
    }
}
