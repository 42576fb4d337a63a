import { SlashCommandBuilder } from "discord.js";
import { resultEmbed } from "../utils/embeds";
import { cancelRoundClose } from "../utils/scheduler";
import { Command } from "./base";

// Anyone may close once the window is over; the winner is paid on close.
export const closeVoting: Command = {
    data: new SlashCommandBuilder().setName("close-voting").setDescription("Close voting and pay the winner"),
    async execute(interaction, { service }) {
        await interaction.deferReply();
        const prize = await service.closeRound(interaction.user.id);
        cancelRoundClose();
        await interaction.editReply({ embeds: [resultEmbed(service.view(), prize)] });
    },
};
