import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LoraOption, ResolutionOption } from "./queue/types.js";
import { logger } from "./logger.js";

const ResolutionFileSchema = z.object({
  resolutions: z
    .array(
      z.object({
        key: z.string().min(1),
        label: z.string().min(1),
        width: z.number().int().positive().multipleOf(8),
        height: z.number().int().positive().multipleOf(8),
      }),
    )
    .min(1)
    .max(25), // one Discord select menu
});

const LoraFileSchema = z.object({
  loras: z
    .array(
      z.object({
        name: z.string().min(1),
        file: z.string().min(1),
        defaultStrength: z.number().min(0).max(2).default(1),
      }),
    )
    .max(25),
});

/** Fixed option sets offered in the generation form. */
export interface Catalog {
  resolutions: ResolutionOption[];
  loras: LoraOption[];
  defaultResolution: ResolutionOption;
}

function readJson(path: string): unknown {
  const abs = resolve(path);
  try {
    const parsed: unknown = JSON.parse(readFileSync(abs, "utf-8"));
    return parsed;
  } catch (err) {
    throw new ConfigError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
  }
}

export function buildCatalog(
  resolutions: ResolutionOption[],
  loras: LoraOption[],
  defaultResolutionKey: string,
): Catalog {
  const keys = new Set<string>();
  for (const r of resolutions) {
    if (keys.has(r.key)) throw new ConfigError([`duplicate resolution "${r.key}"`]);
    keys.add(r.key);
  }
  const files = new Set<string>();
  for (const l of loras) {
    if (files.has(l.file)) throw new ConfigError([`duplicate LoRA file "${l.file}"`]);
    files.add(l.file);
  }
  const defaultResolution = resolutions.find((r) => r.key === defaultResolutionKey);
  if (!defaultResolution) {
    throw new ConfigError([
      `DEFAULT_RESOLUTION "${defaultResolutionKey}" is not one of: ${resolutions.map((r) => r.key).join(", ")}`,
    ]);
  }
  return { resolutions, loras, defaultResolution };
}

/** Read and validate both catalog files. Called once at startup. */
export function loadCatalog(paths: { resolutionsPath: string; lorasPath: string; defaultResolution: string }): Catalog {
  const res = ResolutionFileSchema.safeParse(readJson(paths.resolutionsPath));
  if (!res.success) {
    throw new ConfigError(res.error.issues.map((i) => `${paths.resolutionsPath} ${i.path.join(".")}: ${i.message}`));
  }
  const lor = LoraFileSchema.safeParse(readJson(paths.lorasPath));
  if (!lor.success) {
    throw new ConfigError(lor.error.issues.map((i) => `${paths.lorasPath} ${i.path.join(".")}: ${i.message}`));
  }

  const catalog = buildCatalog(res.data.resolutions, lor.data.loras, paths.defaultResolution);
  logger.info(
    { resolutions: catalog.resolutions.length, loras: catalog.loras.length, defaultResolution: catalog.defaultResolution.key },
    "Catalog loaded",
  );
  return catalog;
}
