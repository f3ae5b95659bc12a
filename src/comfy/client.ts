import { setTimeout as sleep } from "node:timers/promises";
import { request } from "undici";
import { z } from "zod";
import { BackendRejectedError, BackendUnavailableError } from "../errors.js";
import { logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Response shapes (only the fields the bot reads)
// ---------------------------------------------------------------------------

const ImageRefSchema = z.object({
  filename: z.string(),
  subfolder: z.string().default(""),
  type: z.string().default("output"),
});

export type ComfyImageRef = z.infer<typeof ImageRefSchema>;

const HistoryEntrySchema = z.object({
  status: z
    .object({
      completed: z.boolean().default(false),
      status_str: z.string().default(""),
      messages: z.array(z.tuple([z.string(), z.unknown()])).default([]),
    })
    .default({}),
  outputs: z.record(z.object({ images: z.array(ImageRefSchema).optional() }).passthrough()).default({}),
});

export type ComfyHistoryEntry = z.infer<typeof HistoryEntrySchema>;

const PromptResponseSchema = z.object({
  prompt_id: z.string().min(1),
  number: z.number().optional(),
});

const QueueSchema = z.object({
  queue_running: z.array(z.array(z.unknown())).default([]),
  queue_pending: z.array(z.array(z.unknown())).default([]),
});

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() }).passthrough()]).optional(),
  node_errors: z.record(z.unknown()).optional(),
});

export interface ComfyClientOptions {
  baseUrl: string;
  retryAttempts: number;
  retryBaseMs: number;
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

class TransientHttpError extends Error {
  constructor(readonly statusCode: number, message: string) {
    super(message);
    this.name = "TransientHttpError";
  }
}

function isTransientStatus(statusCode: number): boolean {
  return statusCode >= 500 || statusCode === 429;
}

/** Pull a readable reason out of ComfyUI's 400 body. */
function rejectionReason(statusCode: number, text: string): string {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success && parsed.data.error !== undefined) {
      const err = parsed.data.error;
      return typeof err === "string" ? err : err.message;
    }
  } catch {
    // not JSON; fall through to the raw text
  }
  return text.trim().slice(0, 300) || `HTTP ${statusCode}`;
}

/**
 * Run `fn` until it succeeds, a non-transient error is thrown, or the attempt
 * budget is spent. Delays double from `baseMs`.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: { attempts: number; baseMs: number; signal?: AbortSignal; label: string },
): Promise<T> {
  let lastErr: unknown;
  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    opts.signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (err) {
      if (err instanceof BackendRejectedError || opts.signal?.aborted) throw err;
      lastErr = err;
      if (attempt === opts.attempts) break;
      const delayMs = opts.baseMs * 2 ** (attempt - 1);
      logger.warn({ attempt, delayMs, err }, `${opts.label} failed, retrying`);
      await sleep(delayMs, undefined, opts.signal ? { signal: opts.signal } : undefined);
    }
  }
  const detail = lastErr instanceof Error ? lastErr.message : String(lastErr);
  throw new BackendUnavailableError(`${opts.label} failed after ${opts.attempts} attempts: ${detail}`, {
    cause: lastErr,
  });
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class ComfyClient {
  readonly baseUrl: string;

  constructor(private readonly options: ComfyClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
  }

  private async jsonGet(path: string, signal?: AbortSignal): Promise<unknown> {
    const { statusCode, body } = await request(`${this.baseUrl}${path}`, { method: "GET", signal });
    if (statusCode < 200 || statusCode >= 300) {
      await body.dump();
      throw new Error(`ComfyUI GET ${path} returned HTTP ${statusCode}`);
    }
    return body.json();
  }

  private async post(path: string, payload: unknown): Promise<number> {
    const { statusCode, body } = await request(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
    });
    await body.dump();
    return statusCode;
  }

  async ping(): Promise<boolean> {
    try {
      const { statusCode, body } = await request(`${this.baseUrl}/system_stats`, {
        method: "GET",
        headersTimeout: 5_000,
        bodyTimeout: 5_000,
      });
      await body.dump();
      return statusCode === 200;
    } catch (err) {
      logger.debug({ err }, "ComfyUI ping failed");
      return false;
    }
  }

  /**
   * POST /prompt. Connection errors, 5xx and 429 are retried; any other
   * non-2xx, or a reply without prompt_id, is a rejection.
   */
  async submitPrompt(workflow: Record<string, unknown>, clientId: string, signal?: AbortSignal): Promise<string> {
    return withRetry(
      async () => {
        const { statusCode, body } = await request(`${this.baseUrl}/prompt`, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({ prompt: workflow, client_id: clientId }),
          signal,
        });
        const text = await body.text();

        if (isTransientStatus(statusCode)) {
          throw new TransientHttpError(statusCode, `ComfyUI POST /prompt returned HTTP ${statusCode}`);
        }
        if (statusCode < 200 || statusCode >= 300) {
          throw new BackendRejectedError(rejectionReason(statusCode, text));
        }

        let json: unknown;
        try {
          json = JSON.parse(text);
        } catch {
          throw new BackendRejectedError("ComfyUI returned an unreadable response to POST /prompt");
        }
        const parsed = PromptResponseSchema.safeParse(json);
        if (!parsed.success) {
          throw new BackendRejectedError("ComfyUI accepted the workflow but returned no prompt_id");
        }
        logger.debug({ promptId: parsed.data.prompt_id }, "ComfyUI prompt submitted");
        return parsed.data.prompt_id;
      },
      {
        attempts: this.options.retryAttempts,
        baseMs: this.options.retryBaseMs,
        signal,
        label: "ComfyUI POST /prompt",
      },
    );
  }

  async getHistory(promptId: string, signal?: AbortSignal): Promise<ComfyHistoryEntry | null> {
    const data = await this.jsonGet(`/history/${encodeURIComponent(promptId)}`, signal);
    const entry = z.record(z.unknown()).safeParse(data);
    if (!entry.success || entry.data[promptId] === undefined) return null;
    const parsed = HistoryEntrySchema.safeParse(entry.data[promptId]);
    if (!parsed.success) {
      logger.warn({ promptId, issues: parsed.error.issues }, "Unreadable ComfyUI history entry");
      return null;
    }
    return parsed.data;
  }

  /** GET /view, retried like POST /prompt. A 404 or other 4xx is a rejection. */
  async getImage(ref: ComfyImageRef, signal?: AbortSignal): Promise<Buffer> {
    const qs = new URLSearchParams({ filename: ref.filename, subfolder: ref.subfolder, type: ref.type });
    return withRetry(
      async () => {
        const { statusCode, body } = await request(`${this.baseUrl}/view?${qs.toString()}`, { signal });
        if (statusCode === 200) return Buffer.from(await body.arrayBuffer());
        await body.dump();
        const message = `ComfyUI image fetch returned HTTP ${statusCode} for ${ref.filename}`;
        if (isTransientStatus(statusCode)) throw new TransientHttpError(statusCode, message);
        throw new BackendRejectedError(message);
      },
      {
        attempts: this.options.retryAttempts,
        baseMs: this.options.retryBaseMs,
        signal,
        label: "ComfyUI GET /view",
      },
    );
  }

  /** Prompt ids currently executing and waiting in ComfyUI's queue. */
  async getQueue(): Promise<{ running: string[]; pending: string[] }> {
    const parsed = QueueSchema.safeParse(await this.jsonGet("/queue"));
    if (!parsed.success) return { running: [], pending: [] };
    // Queue items are [number, prompt_id, prompt, extra_data, outputs]
    const ids = (items: unknown[][]) => items.map((i) => i[1]).filter((id): id is string => typeof id === "string");
    return { running: ids(parsed.data.queue_running), pending: ids(parsed.data.queue_pending) };
  }

  async deleteFromQueue(promptId: string): Promise<boolean> {
    const statusCode = await this.post("/queue", { delete: [promptId] });
    return statusCode >= 200 && statusCode < 300;
  }

  /** Interrupt `promptId` only; ComfyUI ignores the call when another prompt is executing. */
  async interrupt(promptId: string): Promise<boolean> {
    const statusCode = await this.post("/interrupt", { prompt_id: promptId });
    return statusCode >= 200 && statusCode < 300;
  }

  /**
   * Drop a prompt from ComfyUI: delete it from the queue, then interrupt it
   * in case it is executing. Both requests name the prompt.
   */
  async cancelPrompt(promptId: string): Promise<boolean> {
    const deleted = await this.deleteFromQueue(promptId);
    const interrupted = await this.interrupt(promptId);
    logger.info({ promptId, deleted, interrupted }, "Cancelled ComfyUI prompt");
    return deleted && interrupted;
  }
}
