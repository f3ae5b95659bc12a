import type Database from "better-sqlite3";
import { z } from "zod";
import { logger } from "../logger.js";
import { isTerminal, type GenerationRequest, type JobSnapshot } from "../queue/types.js";

// ---------------------------------------------------------------------------
// Row shape
// ---------------------------------------------------------------------------

const LorasColumn = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "loras is not JSON" });
      return z.NEVER;
    }
  })
  .pipe(z.array(z.object({ name: z.string(), file: z.string(), strength: z.number() })));

const RowSchema = z.object({
  id: z.string(),
  discord_user_id: z.string(),
  discord_guild_id: z.string().nullable(),
  discord_channel_id: z.string(),
  status: z.enum(["succeeded", "failed", "cancelled"]),
  prompt: z.string(),
  original_prompt: z.string(),
  resolution_key: z.string(),
  resolution_label: z.string(),
  width: z.number(),
  height: z.number(),
  loras: LorasColumn,
  upscale: z.number(),
  creativity: z.number().nullable(),
  seed: z.number(),
  comfy_prompt_id: z.string().nullable(),
  image_count: z.number(),
  error_code: z.string().nullable(),
  error_message: z.string().nullable(),
  created_at: z.number(),
  completed_at: z.number(),
});

export interface GenerationRecord {
  id: string;
  status: "succeeded" | "failed" | "cancelled";
  request: GenerationRequest;
  backendToken: string | null;
  imageCount: number;
  errorCode: string | null;
  errorMessage: string | null;
  createdAt: number;
  completedAt: number;
}

function rowToRecord(raw: unknown): GenerationRecord | null {
  const parsed = RowSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues }, "Skipping unreadable history row");
    return null;
  }
  const row = parsed.data;
  return {
    id: row.id,
    status: row.status,
    request: {
      requesterId: row.discord_user_id,
      guildId: row.discord_guild_id,
      channelId: row.discord_channel_id,
      prompt: row.prompt,
      originalPrompt: row.original_prompt,
      resolution: { key: row.resolution_key, label: row.resolution_label, width: row.width, height: row.height },
      loras: row.loras,
      upscale: row.upscale === 1,
      creativity: row.creativity,
      seed: row.seed,
    },
    backendToken: row.comfy_prompt_id,
    imageCount: row.image_count,
    errorCode: row.error_code,
    errorMessage: row.error_message,
    createdAt: row.created_at,
    completedAt: row.completed_at,
  };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/** Finished generations, for /history, re-rolls and upscales. */
export class HistoryStore {
  constructor(private readonly db: Database.Database) {}

  /** Insert a terminal job. Recording the same job twice keeps the first row. */
  record(job: JobSnapshot): boolean {
    if (!isTerminal(job.status)) return false;
    const r = job.request;
    const result = this.db
      .prepare(`
        INSERT OR IGNORE INTO generations (
          id, discord_user_id, discord_guild_id, discord_channel_id,
          status, prompt, original_prompt,
          resolution_key, resolution_label, width, height,
          loras, upscale, creativity, seed,
          comfy_prompt_id, image_count, error_code, error_message,
          created_at, completed_at
        ) VALUES (
          ?, ?, ?, ?,
          ?, ?, ?,
          ?, ?, ?, ?,
          ?, ?, ?, ?,
          ?, ?, ?, ?,
          ?, ?
        )
      `)
      .run(
        job.id,
        r.requesterId,
        r.guildId,
        r.channelId,
        job.status,
        r.prompt,
        r.originalPrompt,
        r.resolution.key,
        r.resolution.label,
        r.resolution.width,
        r.resolution.height,
        JSON.stringify(r.loras),
        r.upscale ? 1 : 0,
        r.creativity,
        r.seed,
        job.backendToken,
        job.result?.length ?? 0,
        job.error?.code ?? null,
        job.error?.message ?? null,
        job.createdAt,
        job.completedAt ?? Date.now(),
      );
    return result.changes > 0;
  }

  get(jobId: string): GenerationRecord | null {
    return rowToRecord(this.db.prepare("SELECT * FROM generations WHERE id = ?").get(jobId));
  }

  /** Newest first. */
  listRecent(userId: string, limit = 10): GenerationRecord[] {
    return this.db
      .prepare("SELECT * FROM generations WHERE discord_user_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?")
      .all(userId, limit)
      .map(rowToRecord)
      .filter((r): r is GenerationRecord => r !== null);
  }

  /** Delete rows that finished before `cutoff` (Unix ms). Returns the count removed. */
  purgeOlderThan(cutoff: number): number {
    const result = this.db.prepare("DELETE FROM generations WHERE completed_at < ?").run(cutoff);
    logger.info({ deleted: result.changes, cutoff }, "History purge complete");
    return result.changes;
  }
}
