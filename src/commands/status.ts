import { SlashCommandBuilder } from "discord.js";
import { statusEmbed } from "../utils/embeds";
import { Command } from "./base";

export const status: Command = {
    data: new SlashCommandBuilder().setName("status").setDescription("Show the voting status and live counts"),
    async execute(interaction, { service }) {
        await interaction.reply({ embeds: [statusEmbed(service.view())] });
    },
};
