import type { Client } from "discord.js";
import { logger } from "../../logger.js";
import type { BotContext } from "../context.js";

export function onReady(client: Client, ctx: BotContext): void {
  logger.info(
    {
      tag: client.user?.tag,
      allowedChannels: ctx.config.discord.allowedChannelIds,
      concurrency: ctx.config.queue.concurrency,
      enhancer: ctx.enhancer?.providerName ?? "none",
    },
    "Bot ready",
  );
}
