import { SlashCommandBuilder } from "discord.js";
import { statusEmbed } from "../utils/embeds";
import { armAutoClose } from "../utils/rounds";
import { Command } from "./base";

export const startVoting: Command = {
    data: new SlashCommandBuilder().setName("start-voting").setDescription("Open the 3-day voting window (owner only)"),
    async execute(interaction, ctx) {
        await interaction.deferReply();
        await ctx.service.startRound(interaction.user.id);
        armAutoClose(interaction.client, ctx);
        await interaction.editReply({ content: "Voting has started!", embeds: [statusEmbed(ctx.service.view())] });
    },
};
