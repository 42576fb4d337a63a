import { Client } from "discord.js";
import type { BotContext } from "../commands/base";
import { armAutoClose } from "../utils/rounds";

export async function onReady(client: Client<true>, ctx: BotContext) {
    console.log(`Logged in as ${client.user.tag}`);
    // a round started before a restart still needs its close timer
    armAutoClose(client, ctx);
}
