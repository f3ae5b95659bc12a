import { Client, GatewayIntentBits } from "discord.js";
import { createInteractionHandler } from "./bot/events/interactionCreate.js";
import { onReady } from "./bot/events/ready.js";
import type { BotContext } from "./bot/context.js";
import { loadCatalog } from "./catalog.js";
import { ComfyBackend } from "./comfy/backend.js";
import { ComfyClient } from "./comfy/client.js";
import { ComfySession } from "./comfy/session.js";
import { loadWorkflow, validate as validateWorkflow } from "./comfy/workflowBinder.js";
import { loadConfigFromEnvironment, type AppConfig } from "./config.js";
import { closeDb, getDb } from "./db/database.js";
import { HistoryStore } from "./db/history.js";
import { PromptEnhancer } from "./enhancer/promptEnhancer.js";
import { createProvider } from "./enhancer/providers.js";
import { ConfigError } from "./errors.js";
import { logger, setLogLevel } from "./logger.js";
import { JobCoordinator } from "./queue/jobQueue.js";
import { startPurgeScheduler } from "./queue/purgeScheduler.js";
import { isTerminal } from "./queue/types.js";

const cleanups: Array<() => void> = [];

// ---------------------------------------------------------------------------
// Startup validation
// ---------------------------------------------------------------------------

async function startup(): Promise<void> {
  logger.info("Fluxcord starting up…");

  // 1. Configuration
  let config: AppConfig;
  try {
    config = loadConfigFromEnvironment();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal(err.message);
      process.exit(1);
    }
    throw err;
  }
  setLogLevel(config.logLevel);

  // 2. Resolution and LoRA catalog
  const catalog = loadCatalog(config.generation);
  logger.info({ resolutions: catalog.resolutions.length, loras: catalog.loras.length }, "Catalog loaded");

  // 3. Database
  const history = new HistoryStore(getDb(config.db.path));
  cleanups.push(closeDb);

  // 4. Validate workflow exists and is structurally valid
  logger.info({ path: config.comfy.workflowPath }, "Validating workflow…");
  let workflow: Record<string, unknown>;
  try {
    workflow = loadWorkflow(config.comfy.workflowPath);
  } catch (err) {
    logger.fatal({ err, path: config.comfy.workflowPath }, "Could not load workflow — cannot start");
    process.exit(1);
  }
  const wfResult = validateWorkflow(workflow);
  if (!wfResult.ok) {
    logger.fatal({ reason: wfResult.reason }, "Workflow failed validation — cannot start");
    process.exit(1);
  }
  logger.info("Workflow OK");

  // 5. Ping ComfyUI
  const comfy = new ComfyClient(config.comfy);
  logger.info({ url: config.comfy.baseUrl }, "Pinging ComfyUI…");
  if (!(await comfy.ping())) {
    logger.fatal({ url: config.comfy.baseUrl }, "ComfyUI is unreachable — cannot start");
    process.exit(1);
  }
  logger.info("ComfyUI reachable");

  // 6. Progress socket (reconnects in the background)
  let session: ComfySession | null = null;
  if (config.comfy.progressMode === "ws") {
    const ws = new ComfySession({ baseUrl: config.comfy.baseUrl });
    ws.start();
    cleanups.push(() => ws.close());
    session = ws;
  }

  // 7. Job coordinator
  const backend = new ComfyBackend(comfy, session, config.comfy);
  const coordinator = new JobCoordinator(backend, {
    concurrency: config.queue.concurrency,
    timeoutMs: config.comfy.timeoutMs,
    retentionMs: config.queue.retentionMs,
    negativePrompt: config.generation.defaultNegativePrompt,
    upscaleFactor: config.upscale.factor,
  });
  cleanups.unshift(() => coordinator.stop());

  coordinator.onUpdate((event) => {
    if (event.type !== "status" || !isTerminal(event.job.status)) return;
    try {
      history.record(event.job);
    } catch (err) {
      logger.error({ jobId: event.job.id, err }, "Failed to record generation history");
    }
  });

  // 8. Prompt enhancer
  const provider = createProvider(config.enhancer);
  const enhancer = provider ? new PromptEnhancer(provider, { timeoutMs: config.enhancer.timeoutMs }) : null;
  logger.info({ provider: config.enhancer.provider, policy: config.enhancer.failurePolicy }, "Prompt enhancer configured");

  // 9. Housekeeping
  cleanups.push(startPurgeScheduler(coordinator, history, config.purge));

  // 10. Build Discord client
  const client = new Client({
    intents: [GatewayIntentBits.Guilds],
  });
  cleanups.push(() => void client.destroy());

  const ctx: BotContext = { config, catalog, coordinator, enhancer, history };
  const onInteractionCreate = createInteractionHandler(ctx, client);

  client.once("ready", () => onReady(client, ctx));
  client.on("interactionCreate", (interaction) => {
    onInteractionCreate(interaction).catch((err: unknown) => {
      logger.error({ err, interactionId: interaction.id }, "Interaction handler failed");
    });
  });

  client.on("error", (err) => logger.error({ err }, "Discord client error"));

  await client.login(config.discord.token);
}

// ---------------------------------------------------------------------------
// Graceful shutdown
// ---------------------------------------------------------------------------

function shutdown(signal: string): void {
  logger.info({ signal }, "Shutting down…");
  for (const cleanup of cleanups.splice(0)) {
    try {
      cleanup();
    } catch (err) {
      logger.error({ err }, "Cleanup step failed");
    }
  }
  process.exit(0);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
});

startup().catch((err: unknown) => {
  logger.fatal({ err }, "Startup failed");
  process.exit(1);
});
