/**
 * Interactive first-run setup. Writes the answers into `.env`, keeping any
 * comments and keys already there.
 * Run with: npm run setup
 */
import { createInterface, type Interface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import type { ZodTypeAny } from "zod";
import { ComfyClient } from "../comfy/client.js";
import { ConfigSchema, ENHANCER_PROVIDERS } from "../config.js";
import { logger } from "../logger.js";
import { loadDotenv, writeEnvFile } from "../setup/envFile.js";

const ENV_PATH = ".env";

type Key = keyof typeof ConfigSchema.shape;

/**
 * Ask until the answer passes the key's schema. An empty answer keeps the
 * current value (shown in brackets) when there is one.
 */
async function ask(rl: Interface, key: Key, question: string, current: string | undefined): Promise<string> {
  const schema: ZodTypeAny = ConfigSchema.shape[key];
  for (;;) {
    const hint = current ? ` [${key.endsWith("TOKEN") || key.endsWith("KEY") ? "****" : current}]` : "";
    const answer = (await rl.question(`${question}${hint}: `)).trim() || (current ?? "");
    const parsed = schema.safeParse(answer === "" ? undefined : answer);
    if (parsed.success) return answer;
    output.write(`  ✗ ${parsed.error.issues.map((i) => i.message).join("; ")}\n`);
  }
}

async function main(): Promise<void> {
  loadDotenv(ENV_PATH);
  const env = process.env;
  const rl = createInterface({ input, output });
  const updates: Record<string, string> = {};

  try {
    output.write("Discord application (https://discord.com/developers/applications)\n");
    updates.DISCORD_TOKEN = await ask(rl, "DISCORD_TOKEN", "Bot token", env.DISCORD_TOKEN);
    updates.DISCORD_CLIENT_ID = await ask(rl, "DISCORD_CLIENT_ID", "Application (client) id", env.DISCORD_CLIENT_ID);
    updates.DISCORD_GUILD_ID = await ask(rl, "DISCORD_GUILD_ID", "Server (guild) id", env.DISCORD_GUILD_ID);

    output.write("\nComfyUI\n");
    for (;;) {
      const url = await ask(rl, "COMFY_BASE_URL", "ComfyUI URL", env.COMFY_BASE_URL ?? "http://127.0.0.1:8188");
      const alive = await new ComfyClient({ baseUrl: url, retryAttempts: 1, retryBaseMs: 0 }).ping();
      if (alive) {
        output.write("  ✓ ComfyUI reachable\n");
        updates.COMFY_BASE_URL = url;
        break;
      }
      const keep = (await rl.question("  ✗ ComfyUI did not answer. Save this URL anyway? (y/N): ")).trim().toLowerCase();
      if (keep === "y") {
        updates.COMFY_BASE_URL = url;
        break;
      }
    }

    output.write(`\nPrompt enhancement (${ENHANCER_PROVIDERS.join(", ")})\n`);
    const provider = await ask(rl, "ENHANCER_PROVIDER", "Provider", env.ENHANCER_PROVIDER ?? "none");
    updates.ENHANCER_PROVIDER = provider;
    if (provider !== "none") {
      if (provider !== "lmstudio") {
        updates.ENHANCER_API_KEY = await ask(rl, "ENHANCER_API_KEY", "API key", env.ENHANCER_API_KEY);
      }
      updates.ENHANCER_MODEL = await ask(rl, "ENHANCER_MODEL", "Model name", env.ENHANCER_MODEL);
      const baseUrl = await ask(rl, "ENHANCER_BASE_URL", "Endpoint URL (blank for the provider default)", env.ENHANCER_BASE_URL);
      if (baseUrl) updates.ENHANCER_BASE_URL = baseUrl;
    }

    output.write("\nGeneration\n");
    updates.DEFAULT_RESOLUTION = await ask(rl, "DEFAULT_RESOLUTION", "Default resolution key", env.DEFAULT_RESOLUTION ?? "1024x1024");
    updates.QUEUE_CONCURRENCY = await ask(rl, "QUEUE_CONCURRENCY", "Jobs run at once (1-4)", env.QUEUE_CONCURRENCY ?? "1");
  } finally {
    rl.close();
  }

  writeEnvFile(ENV_PATH, updates);
  output.write(`\nSaved ${Object.keys(updates).length} settings to ${ENV_PATH}. Next: npm run deploy-commands\n`);
}

main().catch((err: unknown) => {
  logger.error({ err }, "Setup failed");
  process.exit(1);
});
