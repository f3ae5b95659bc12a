import { z } from "zod";
import { ConfigError } from "./errors.js";
import { loadDotenv } from "./setup/envFile.js";

const booleanish = z.preprocess((v) => v !== "false" && v !== "0" && v !== "", z.boolean());

export const ENHANCER_PROVIDERS = ["none", "lmstudio", "openai", "anthropic", "gemini"] as const;
export type EnhancerProviderName = (typeof ENHANCER_PROVIDERS)[number];

export const ConfigSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "DISCORD_TOKEN is required"),
  DISCORD_CLIENT_ID: z.string().min(1, "DISCORD_CLIENT_ID is required"),
  DISCORD_GUILD_ID: z.string().min(1, "DISCORD_GUILD_ID is required"),
  // Empty = every channel the bot can see
  ALLOWED_CHANNEL_IDS: z.string().default(""),
  COMFY_BASE_URL: z.string().url("COMFY_BASE_URL must be a valid URL").default("http://127.0.0.1:8188"),
  COMFY_WORKFLOW_PATH: z.string().default("./workflows/txt2img.json"),
  COMFY_CHECKPOINT: z.string().default(""),
  COMFY_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  COMFY_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  COMFY_RETRY_BASE_MS: z.coerce.number().int().min(0).default(1_000),
  COMFY_PROGRESS_MODE: z.enum(["ws", "poll"]).default("ws"),
  COMFY_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2_000),
  QUEUE_CONCURRENCY: z.coerce.number().int().min(1).max(4).default(1),
  JOB_RETENTION_MINUTES: z.coerce.number().int().positive().default(30),
  DB_PATH: z.string().default("./data/fluxcord.db"),
  HISTORY_MAX_AGE_HOURS: z.coerce.number().int().positive().default(720),
  PURGE_INTERVAL_HOURS: z.coerce.number().positive().default(6),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  DEFAULT_RESOLUTION: z.string().default("1024x1024"),
  DEFAULT_NEGATIVE_PROMPT: z.string().default(""),
  UPSCALE_ENABLED: booleanish.default(true),
  UPSCALE_FACTOR: z.coerce.number().min(1).max(4).default(2),
  RESOLUTIONS_PATH: z.string().default("./config/resolutions.json"),
  LORAS_PATH: z.string().default("./config/loras.json"),
  ENHANCER_PROVIDER: z.enum(ENHANCER_PROVIDERS).default("none"),
  ENHANCER_BASE_URL: z.string().url("ENHANCER_BASE_URL must be a valid URL").optional(),
  ENHANCER_API_KEY: z.string().default(""),
  ENHANCER_MODEL: z.string().default(""),
  ENHANCER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ENHANCER_FAILURE_POLICY: z.enum(["fallback", "abort"]).default("fallback"),
});

export type RawConfig = z.infer<typeof ConfigSchema>;

/** Default endpoint per provider when ENHANCER_BASE_URL is not set. */
const ENHANCER_DEFAULT_URLS: Record<EnhancerProviderName, string> = {
  none: "",
  lmstudio: "http://127.0.0.1:1234",
  openai: "https://api.openai.com",
  anthropic: "https://api.anthropic.com",
  gemini: "https://generativelanguage.googleapis.com",
};

function buildConfig(env: RawConfig) {
  return {
    discord: {
      token: env.DISCORD_TOKEN,
      clientId: env.DISCORD_CLIENT_ID,
      guildId: env.DISCORD_GUILD_ID,
      allowedChannelIds: env.ALLOWED_CHANNEL_IDS.split(",").map((s) => s.trim()).filter(Boolean),
    },
    comfy: {
      baseUrl: env.COMFY_BASE_URL.replace(/\/$/, ""),
      workflowPath: env.COMFY_WORKFLOW_PATH,
      checkpoint: env.COMFY_CHECKPOINT,
      timeoutMs: env.COMFY_TIMEOUT_MS,
      retryAttempts: env.COMFY_RETRY_ATTEMPTS,
      retryBaseMs: env.COMFY_RETRY_BASE_MS,
      progressMode: env.COMFY_PROGRESS_MODE,
      pollIntervalMs: env.COMFY_POLL_INTERVAL_MS,
    },
    queue: {
      concurrency: env.QUEUE_CONCURRENCY,
      retentionMs: env.JOB_RETENTION_MINUTES * 60_000,
    },
    db: {
      path: env.DB_PATH,
    },
    purge: {
      maxAgeHours: env.HISTORY_MAX_AGE_HOURS,
      intervalHours: env.PURGE_INTERVAL_HOURS,
    },
    generation: {
      defaultResolution: env.DEFAULT_RESOLUTION,
      defaultNegativePrompt: env.DEFAULT_NEGATIVE_PROMPT,
      resolutionsPath: env.RESOLUTIONS_PATH,
      lorasPath: env.LORAS_PATH,
    },
    upscale: {
      enabled: env.UPSCALE_ENABLED,
      factor: env.UPSCALE_FACTOR,
    },
    enhancer: {
      provider: env.ENHANCER_PROVIDER,
      baseUrl: (env.ENHANCER_BASE_URL ?? ENHANCER_DEFAULT_URLS[env.ENHANCER_PROVIDER]).replace(/\/$/, ""),
      apiKey: env.ENHANCER_API_KEY,
      model: env.ENHANCER_MODEL,
      timeoutMs: env.ENHANCER_TIMEOUT_MS,
      failurePolicy: env.ENHANCER_FAILURE_POLICY,
    },
    logLevel: env.LOG_LEVEL,
  } as const;
}

export type AppConfig = ReturnType<typeof buildConfig>;

/**
 * Parse settings out of `env`. Called once at startup; the result is passed
 * to each component's constructor. Throws ConfigError listing every issue.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const raw = parsed.data;
  const issues: string[] = [];
  if (["openai", "anthropic", "gemini"].includes(raw.ENHANCER_PROVIDER) && !raw.ENHANCER_API_KEY) {
    issues.push(`ENHANCER_API_KEY: required for provider "${raw.ENHANCER_PROVIDER}"`);
  }
  if (raw.ENHANCER_PROVIDER !== "none" && raw.ENHANCER_PROVIDER !== "lmstudio" && !raw.ENHANCER_MODEL) {
    issues.push(`ENHANCER_MODEL: required for provider "${raw.ENHANCER_PROVIDER}"`);
  }
  if (issues.length > 0) throw new ConfigError(issues);

  return buildConfig(raw);
}

/** Load `.env` (without overriding the real environment) and parse it. */
export function loadConfigFromEnvironment(): AppConfig {
  loadDotenv();
  return loadConfig(process.env);
}
