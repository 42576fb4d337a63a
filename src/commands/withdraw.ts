import { SlashCommandBuilder } from "discord.js";
import { formatAmount } from "../utils/amount";
import { mention } from "../utils/embeds";
import { Command } from "./base";

export const withdraw: Command = {
    data: new SlashCommandBuilder()
        .setName("withdraw")
        .setDescription("Withdraw the commission (owner only)")
        .addUserOption((o) => o.setName("to").setDescription("Recipient (defaults to you)")),
    async execute(interaction, { service }) {
        await interaction.deferReply({ ephemeral: true });
        const to = interaction.options.getUser("to") ?? interaction.user;
        const amount = await service.withdrawCommission(interaction.user.id, to.id);
        await interaction.editReply({ content: `Sent ${formatAmount(amount)} to ${mention(to.id)}.` });
    },
};
