import { SlashCommandBuilder } from "discord.js";
import { formatEther } from "ethers";
import { parseAmount } from "../utils/amount";
import { mention } from "../utils/embeds";
import { VOTE_FEE } from "../utils/ledger/constants";
import { Command } from "./base";

/**
 * /vote <candidate> <amount>
 * The amount is the payment attached to the vote and must be exactly the fee.
 * Each user votes once, whichever candidate they pick.
 *
 * Only a one-way voter hash (HMAC) is written to the vote records.
 */
export const vote: Command = {
    data: new SlashCommandBuilder()
        .setName("vote")
        .setDescription(`Vote for a candidate (costs ${formatEther(VOTE_FEE)} ETH)`)
        .addUserOption((o) => o.setName("candidate").setDescription("Candidate to vote for").setRequired(true))
        .addStringOption((o) => o.setName("amount").setDescription("Payment in ETH, e.g. 0.01").setRequired(true)),
    async execute(interaction, { service }) {
        await interaction.deferReply({ ephemeral: true });
        const candidate = interaction.options.getUser("candidate", true);
        const raw = interaction.options.getString("amount", true);
        const amount = parseAmount(raw);
        if (amount === null) {
            await interaction.editReply({ content: `"${raw}" is not a valid amount.` });
            return;
        }
        await service.castVote(interaction.user.id, candidate.id, amount);
        await interaction.editReply({ content: `Your vote for ${mention(candidate.id)} has been recorded.` });
    },
};
