import type { Catalog } from "../catalog.js";
import type { AppConfig } from "../config.js";
import type { HistoryStore } from "../db/history.js";
import type { PromptEnhancer } from "../enhancer/promptEnhancer.js";
import type { JobCoordinator } from "../queue/jobQueue.js";

/** Everything the interaction handlers need, built once at startup. */
export interface BotContext {
  config: AppConfig;
  catalog: Catalog;
  coordinator: JobCoordinator;
  enhancer: PromptEnhancer | null;
  history: HistoryStore;
}

/** True when commands may be used in `channelId`. An empty allow-list permits every channel. */
export function isChannelAllowed(ctx: BotContext, channelId: string | null): boolean {
  const allowed = ctx.config.discord.allowedChannelIds;
  return allowed.length === 0 || (channelId !== null && allowed.includes(channelId));
}
