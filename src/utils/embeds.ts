import { EmbedBuilder } from "discord.js";
import { LedgerView } from "../types";
import { formatAmount } from "./amount";

export function timeRemaining(deadline: number, now: number = Math.floor(Date.now() / 1000)) {
    const total = Math.max(0, deadline - now);
    const s = total % 60;
    const m = Math.floor(total / 60) % 60;
    const h = Math.floor(total / (60 * 60)) % 24;
    const d = Math.floor(total / (60 * 60 * 24));
    const parts: string[] = [];
    if (d) parts.push(`${d}d`);
    if (h) parts.push(`${h}h`);
    if (m) parts.push(`${m}m`);
    if (s) parts.push(`${s}s`);
    return parts.join(" ") || "0s";
}

export function mention(id: string) {
    return `<@${id}>`;
}

// discord rejects embed field values longer than this
export const FIELD_LIMIT = 1024;

/** Joins lines, cutting the tail off with "…and N more" once the field would overflow. */
export function fitLines(lines: string[], limit = FIELD_LIMIT) {
    const full = lines.join("\n");
    if (full.length <= limit) return full;
    for (let keep = lines.length - 1; keep >= 0; keep--) {
        const text = [...lines.slice(0, keep), `…and ${lines.length - keep} more`].join("\n");
        if (text.length <= limit) return text;
    }
    return `…and ${lines.length} more`;
}

const BAR_CELLS = 10;

/** One line per candidate, in registration order: bar, votes, share, mention. */
export function makeBar(candidates: LedgerView["candidates"], total: number): string[] {
    return candidates.map(({ id, votes }) => {
        const share = total === 0 ? 0 : votes / total;
        const filled = Math.round(share * BAR_CELLS);
        return `${"▰".repeat(filled)}${"▱".repeat(BAR_CELLS - filled)} ${votes} (${Math.round(share * 100)}%) ${mention(id)}`;
    });
}

export function statusEmbed(view: LedgerView, now?: number) {
    const ends =
        view.deadline === null
            ? "Not started"
            : `<t:${view.deadline}:R> (${timeRemaining(view.deadline, now)})`;
    const candidates = view.candidates.length
        ? fitLines(view.candidates.map((c, i) => `${i + 1}. ${mention(c.id)} (${c.votes})`))
        : "No candidates yet";

    return new EmbedBuilder()
        .setTitle("Voting")
        .addFields(
            { name: "Status", value: view.phase, inline: true },
            { name: "Ends", value: ends, inline: true },
            { name: "Balance", value: formatAmount(view.balance), inline: true },
            { name: "Owner", value: mention(view.administrator), inline: true },
            { name: "Leader", value: view.currentWinner ? mention(view.currentWinner) : "—", inline: true },
            { name: "Candidates", value: candidates },
        )
        .setFooter({ text: `Ledger ${view.id}` })
        .setColor(0x00ae86)
        .setTimestamp();
}

export function resultEmbed(view: LedgerView, prize: bigint) {
    const summary = view.currentWinner
        ? `Winner: ${mention(view.currentWinner)} receives **${formatAmount(prize)}**`
        : "Nobody voted, no prize was paid.";

    const e = new EmbedBuilder()
        .setTitle("Results")
        .setDescription(`${summary}\nTotal Votes: **${view.totalVotes}**`)
        .addFields({ name: "Commission left", value: formatAmount(view.balance) })
        .setFooter({ text: `Ledger ${view.id}` })
        .setColor(0x00ff99)
        .setTimestamp();
    if (view.candidates.length) e.addFields({ name: "Results (visual)", value: fitLines(makeBar(view.candidates, view.totalVotes)) });
    return e;
}
