import { SlashCommandBuilder } from "discord.js";
import { mention } from "../utils/embeds";
import { Command } from "./base";

/**
 * /add-candidate <candidate>
 * Owner only, while voting is idle. Order of registration is the order shown in /status.
 */
export const addCandidate: Command = {
    data: new SlashCommandBuilder()
        .setName("add-candidate")
        .setDescription("Register a candidate (owner only)")
        .addUserOption((o) => o.setName("candidate").setDescription("Candidate to register").setRequired(true)),
    async execute(interaction, { service }) {
        await interaction.deferReply({ ephemeral: true });
        const candidate = interaction.options.getUser("candidate", true);
        await service.registerCandidate(interaction.user.id, candidate.id);
        await interaction.editReply({ content: `${mention(candidate.id)} has been added as a candidate.` });
    },
};
