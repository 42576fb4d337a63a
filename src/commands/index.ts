import { Collection } from "discord.js";
import { addCandidate } from "./add-candidate";
import { Command } from "./base";
import { closeVoting } from "./close-voting";
import { startVoting } from "./start-voting";
import { status } from "./status";
import { vote } from "./vote";
import { withdraw } from "./withdraw";

export const commands: Command[] = [addCandidate, startVoting, vote, closeVoting, withdraw, status];

export function commandCollection() {
    const collection = new Collection<string, Command>();
    for (const command of commands) collection.set(command.data.name, command);
    return collection;
}

export type { BotContext, Command } from "./base";
