import { z } from "zod";
import type { Catalog } from "../catalog.js";
import { MAX_LORAS } from "../comfy/workflowBinder.js";
import { ValidationError } from "../errors.js";
import type { GenerationRequest, LoraSelection } from "../queue/types.js";

export const MAX_PROMPT_LENGTH = 1500;
export const MAX_SEED = 4_294_967_295;
export const MIN_LORA_STRENGTH = 0;
export const MAX_LORA_STRENGTH = 2;

/** What the user has picked so far in the /imagine form. Free-text fields stay raw until parsed. */
export interface DraftParams {
  prompt: string;
  creativity: string; // blank = no enhancement
  seed: string;       // blank or "random" = pick one
  resolution: string; // catalog key
  loras: Array<{ file: string; strength: number }>;
  upscale: boolean;
}

export interface RequestOrigin {
  requesterId: string;
  guildId: string | null;
  channelId: string;
}

/** Generate a random seed in the ComfyUI valid range (0–4 294 967 295). */
export function randomSeed(): number {
  return Math.floor(Math.random() * (MAX_SEED + 1));
}

/**
 * Resolve a raw seed string. Blank / "random" gives a fresh random seed,
 * an integer in range gives itself, anything else null.
 */
export function resolveSeed(seedRaw: string): number | null {
  const trimmed = seedRaw.trim().toLowerCase();
  if (trimmed === "" || trimmed === "random") return randomSeed();
  if (!/^\d+$/.test(trimmed)) return null;
  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed) || parsed > MAX_SEED) return null;
  return parsed;
}

const CreativitySchema = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? null : v),
  z.coerce
    .number({ invalid_type_error: "Creativity must be a whole number from 1 to 10." })
    .int("Creativity must be a whole number from 1 to 10.")
    .min(1, "Creativity must be a whole number from 1 to 10.")
    .max(10, "Creativity must be a whole number from 1 to 10.")
    .nullable(),
);

const SeedSchema = z.string().transform((raw, ctx) => {
  const seed = resolveSeed(raw);
  if (seed === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Seed must be a whole number between 0 and 4,294,967,295, or blank for random.",
    });
    return z.NEVER;
  }
  return seed;
});

function buildDraftSchema(catalog: Catalog) {
  const resolutionKeys = catalog.resolutions.map((r) => r.key);
  const loraFiles = new Set(catalog.loras.map((l) => l.file));

  return z.object({
    prompt: z
      .string()
      .trim()
      .min(1, "Prompt cannot be empty.")
      .max(MAX_PROMPT_LENGTH, `Prompt cannot be longer than ${MAX_PROMPT_LENGTH} characters.`),
    creativity: CreativitySchema,
    seed: SeedSchema,
    resolution: z.string().refine(
      (key) => resolutionKeys.includes(key),
      (key) => ({ message: `Resolution "${key}" is not available. Choose one of: ${resolutionKeys.join(", ")}.` }),
    ),
    loras: z
      .array(
        z.object({
          file: z.string().refine(
            (file) => loraFiles.has(file),
            (file) => ({ message: `LoRA "${file}" is not in the catalog.` }),
          ),
          strength: z
            .number({ invalid_type_error: "LoRA strength must be a number." })
            .min(MIN_LORA_STRENGTH, `LoRA strength must be between ${MIN_LORA_STRENGTH} and ${MAX_LORA_STRENGTH}.`)
            .max(MAX_LORA_STRENGTH, `LoRA strength must be between ${MIN_LORA_STRENGTH} and ${MAX_LORA_STRENGTH}.`),
        }),
      )
      .max(MAX_LORAS, `At most ${MAX_LORAS} LoRAs can be selected.`)
      .refine((ls) => new Set(ls.map((l) => l.file)).size === ls.length, "Each LoRA can only be selected once."),
    upscale: z.boolean(),
  });
}

/**
 * Turn a draft into an immutable GenerationRequest, or throw a
 * ValidationError listing every problem.
 */
export function parseGenerationRequest(draft: DraftParams, catalog: Catalog, origin: RequestOrigin): GenerationRequest {
  const parsed = buildDraftSchema(catalog).safeParse(draft);
  if (!parsed.success) {
    throw new ValidationError([...new Set(parsed.error.issues.map((i) => i.message))]);
  }
  const values = parsed.data;

  const resolution = catalog.resolutions.find((r) => r.key === values.resolution);
  if (!resolution) throw new ValidationError([`Resolution "${values.resolution}" is not available.`]);

  const loras: LoraSelection[] = [];
  for (const pick of values.loras) {
    const option = catalog.loras.find((l) => l.file === pick.file);
    if (option) loras.push({ name: option.name, file: option.file, strength: pick.strength });
  }

  return Object.freeze({
    requesterId: origin.requesterId,
    guildId: origin.guildId,
    channelId: origin.channelId,
    prompt: values.prompt,
    originalPrompt: values.prompt,
    resolution: Object.freeze({ ...resolution }),
    loras: Object.freeze(loras.map((l) => Object.freeze(l))),
    upscale: values.upscale,
    creativity: values.creativity,
    seed: values.seed,
  });
}

/** Copy of `request` generating from `prompt`; the typed prompt is kept as `originalPrompt`. */
export function withEnhancedPrompt(request: GenerationRequest, prompt: string): GenerationRequest {
  return Object.freeze({ ...request, prompt });
}

/** Copy of `request` for a re-roll (new seed) or upscale of an earlier generation. */
export function deriveRequest(
  request: GenerationRequest,
  changes: Partial<Pick<GenerationRequest, "seed" | "upscale" | "channelId" | "creativity">>,
): GenerationRequest {
  return Object.freeze({ ...request, ...changes });
}

