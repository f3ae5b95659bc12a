import { SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { logger } from "../../logger.js";
import { buildHistoryEmbed } from "../components/resultEmbed.js";
import type { BotContext } from "../context.js";

const HISTORY_LIMIT = 10;

export const data = new SlashCommandBuilder()
  .setName("history")
  .setDescription("Show your last 10 generations");

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void> {
  const records = ctx.history.listRecent(interaction.user.id, HISTORY_LIMIT);
  logger.debug({ userId: interaction.user.id, count: records.length }, "/history");
  await interaction.reply({ embeds: [buildHistoryEmbed(records)], ephemeral: true });
}
