/**
 * Register slash commands scoped to the configured guild.
 * Run with: npm run deploy-commands
 */
import { REST, Routes } from "discord.js";
import { commands } from "../bot/commands/index.js";
import { loadConfigFromEnvironment } from "../config.js";
import { logger } from "../logger.js";

const config = loadConfigFromEnvironment();
const rest = new REST({ version: "10" }).setToken(config.discord.token);

const body = [...commands.values()].map((command) => command.data.toJSON());

logger.info(
  { guildId: config.discord.guildId, commandCount: body.length },
  "Deploying guild-scoped slash commands…",
);

rest
  .put(Routes.applicationGuildCommands(config.discord.clientId, config.discord.guildId), { body })
  .then(() => {
    logger.info("Slash commands registered successfully.");
  })
  .catch((err: unknown) => {
    logger.error({ err }, "Failed to register slash commands");
    process.exit(1);
  });
