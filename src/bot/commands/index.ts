import type { ChatInputCommandInteraction, SlashCommandBuilder } from "discord.js";
import type { BotContext } from "../context.js";
import * as history from "./history.js";
import * as imagine from "./imagine.js";

export interface SlashCommand {
  data: Pick<SlashCommandBuilder, "name" | "toJSON">;
  execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void>;
}

export const commands: ReadonlyMap<string, SlashCommand> = new Map(
  [imagine, history].map((command): [string, SlashCommand] => [command.data.name, command]),
);
