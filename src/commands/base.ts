import { ChatInputCommandInteraction, RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import { BotConfig } from "../config";
import { LedgerService } from "../utils/ledgerService";

export interface BotContext {
    service: LedgerService;
    config: BotConfig;
}

export interface Command {
    data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
    execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void>;
}
