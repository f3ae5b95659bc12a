import { setTimeout as sleep } from "node:timers/promises";
import { BackendRejectedError, BackendUnavailableError } from "../errors.js";
import { logger } from "../logger.js";
import { untilAborted } from "../queue/eventChannel.js";
import type { BackendClient, BackendEvent, GeneratedImage, WorkflowParameters } from "../queue/types.js";
import { withRetry, type ComfyClient, type ComfyHistoryEntry } from "./client.js";
import { stageLabels, translateComfyMessage, type ComfyMessage, type ComfySession, type NodeLabels } from "./session.js";
import { bind, loadWorkflow } from "./workflowBinder.js";

export interface ComfyBackendOptions {
  workflowPath: string;
  checkpoint: string;
  progressMode: "ws" | "poll";
  pollIntervalMs: number;
  retryAttempts: number;
  retryBaseMs: number;
}

/** ComfyUI writes live previews under this prefix; they are not results. */
const TEMP_PREFIX = "ComfyUI_temp";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The execution_error / execution_interrupted message stored in a finished history record. */
function failureMessage(entry: ComfyHistoryEntry): ComfyMessage | null {
  for (const [type, data] of entry.status.messages) {
    if (type === "execution_error" || type === "execution_interrupted") {
      return { type, data: isRecord(data) ? data : {} };
    }
  }
  if (entry.status.status_str === "error") {
    return { type: "execution_error", data: { node_type: "ComfyUI", exception_message: "execution error" } };
  }
  return null;
}

function historyFailure(entry: ComfyHistoryEntry): BackendEvent | null {
  const message = failureMessage(entry);
  const update = message ? translateComfyMessage(message) : null;
  return update?.kind === "event" ? update.event : null;
}

function isFinished(entry: ComfyHistoryEntry): boolean {
  return entry.status.completed || entry.status.status_str === "error";
}

/** BackendClient over ComfyUI's HTTP API, with progress from the WebSocket or by polling. */
export class ComfyBackend implements BackendClient {
  private readonly labels = new Map<string, NodeLabels>();

  constructor(
    private readonly client: ComfyClient,
    private readonly session: ComfySession | null,
    private readonly options: ComfyBackendOptions,
  ) {}

  async submit(params: WorkflowParameters, signal?: AbortSignal): Promise<string> {
    const template = loadWorkflow(this.options.workflowPath);
    const bound = bind(template, params, this.options.checkpoint);
    if (!bound.ok) throw new BackendRejectedError(bound.reason);

    const clientId = this.session?.clientId ?? "fluxcord";
    const promptId = await this.client.submitPrompt(bound.workflow, clientId, signal);
    if (this.options.progressMode === "ws") this.labels.set(promptId, stageLabels(bound.workflow));
    logger.info({ promptId, width: params.width, height: params.height, loras: params.loras.length }, "Workflow queued in ComfyUI");
    return promptId;
  }

  events(token: string, signal?: AbortSignal): AsyncIterable<BackendEvent> {
    const sig = signal ?? new AbortController().signal;
    return this.options.progressMode === "ws" && this.session
      ? this.socketEvents(this.session, token, sig)
      : this.polledEvents(token, sig);
  }

  async cancel(token: string): Promise<boolean> {
    this.labels.delete(token);
    return this.client.cancelPrompt(token);
  }

  // -------------------------------------------------------------------------
  // Progress sources
  // -------------------------------------------------------------------------

  private async *socketEvents(session: ComfySession, token: string, signal: AbortSignal): AsyncGenerator<BackendEvent> {
    // A completion that happened while the socket was down would never arrive.
    const unsubscribe = session.onReconnect(() => {
      this.client.getHistory(token).then(
        (entry) => {
          if (!entry || !isFinished(entry)) return;
          const failure = failureMessage(entry);
          const message: ComfyMessage = failure
            ? { type: failure.type, data: { ...failure.data, prompt_id: token } }
            : { type: "executing", data: { node: null, prompt_id: token } };
          logger.info({ promptId: token }, "Prompt finished while WebSocket was down");
          session.push(token, message);
        },
        (err: unknown) => logger.warn({ promptId: token, err }, "History check after reconnect failed"),
      );
    });

    const labels = this.labels.get(token);
    try {
      for await (const message of untilAborted(session.messages(token), signal)) {
        const update = translateComfyMessage(message, labels);
        if (!update) continue;
        if (update.kind === "complete") {
          yield await this.collectOutputs(token, signal);
          return;
        }
        yield update.event;
        if (update.event.type === "failed") return;
      }
    } finally {
      unsubscribe();
      this.labels.delete(token);
    }
  }

  private async *polledEvents(token: string, signal: AbortSignal): AsyncGenerator<BackendEvent> {
    let started = false;
    let failures = 0;
    while (!signal.aborted) {
      try {
        await sleep(this.options.pollIntervalMs, undefined, { signal });
      } catch {
        return; // aborted
      }

      let entry: ComfyHistoryEntry | null;
      try {
        entry = await this.client.getHistory(token, signal);
      } catch (err) {
        if (signal.aborted) return;
        failures++;
        logger.debug({ promptId: token, err, failures }, "History poll failed");
        if (failures >= this.options.retryAttempts) {
          const detail = err instanceof Error ? err.message : String(err);
          yield {
            type: "failed",
            error: new BackendUnavailableError(`ComfyUI GET /history failed ${failures} times in a row: ${detail}`, {
              cause: err,
            }),
          };
          return;
        }
        continue;
      }
      failures = 0;

      if (entry && isFinished(entry)) {
        const failure = historyFailure(entry);
        yield failure ?? (await this.collectOutputs(token, signal, entry));
        return;
      }

      if (!started) {
        const queue = await this.client.getQueue().catch((err: unknown) => {
          logger.debug({ promptId: token, err }, "Queue poll failed");
          return null;
        });
        if (queue?.running.includes(token)) {
          started = true;
          yield { type: "started" };
        }
      }
    }
  }

  // -------------------------------------------------------------------------
  // Outputs
  // -------------------------------------------------------------------------

  private async collectOutputs(token: string, signal: AbortSignal, known?: ComfyHistoryEntry): Promise<BackendEvent> {
    const entry =
      known ??
      (await withRetry(
        async () => {
          const found = await this.client.getHistory(token, signal);
          if (!found) throw new Error(`No history entry for prompt ${token}`);
          return found;
        },
        {
          attempts: this.options.retryAttempts,
          baseMs: this.options.retryBaseMs,
          signal,
          label: "ComfyUI GET /history",
        },
      ));

    const refs = Object.values(entry.outputs)
      .flatMap((out) => out.images ?? [])
      .filter((img) => !img.filename.startsWith(TEMP_PREFIX));

    if (refs.length === 0) {
      return { type: "failed", error: new BackendRejectedError("The workflow finished without producing an image") };
    }

    const images: GeneratedImage[] = [];
    for (const ref of refs) {
      images.push({ filename: ref.filename, data: await this.client.getImage(ref, signal) });
    }
    logger.debug({ promptId: token, count: images.length }, "Downloaded generated images");
    return { type: "succeeded", images };
  }
}
