import WebSocket from "ws";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { BackendRejectedError } from "../errors.js";
import { logger } from "../logger.js";
import { EventChannel } from "../queue/eventChannel.js";
import type { BackendEvent } from "../queue/types.js";

// ---------------------------------------------------------------------------
// Message translation
// ---------------------------------------------------------------------------

const MessageSchema = z.object({
  type: z.string(),
  data: z.record(z.unknown()).default({}),
});

export type ComfyMessage = z.infer<typeof MessageSchema>;

/** A translated message: a backend event, or the signal that outputs are ready. */
export type ComfyUpdate = { kind: "event"; event: BackendEvent } | { kind: "complete" };

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function num(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function parseComfyMessage(raw: string): ComfyMessage | null {
  try {
    const parsed = MessageSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Prompt id a message belongs to, or null for broadcast messages such as `status`. */
export function promptIdOf(message: ComfyMessage): string | null {
  return str(message.data["prompt_id"]) ?? null;
}

/** Status text shown while a workflow node runs, keyed by node id. */
export type NodeLabels = ReadonlyMap<string, string>;

const STAGE_LABELS: Record<string, string> = {
  CheckpointLoaderSimple: "Loading main model…",
  CheckpointLoader: "Loading main model…",
  UNETLoader: "Loading main model…",
  CLIPLoader: "Loading CLIP model…",
  DualCLIPLoader: "Loading CLIP model…",
  VAELoader: "Loading VAE…",
  VAEDecode: "Decoding image…",
  ImageScaleBy: "Upscaling…",
};

/** Loading-stage labels for the nodes of a bound API-format workflow. */
export function stageLabels(workflow: Record<string, unknown>): Map<string, string> {
  const labels = new Map<string, string>();
  for (const [nodeId, node] of Object.entries(workflow)) {
    if (!isRecord(node)) continue;
    const classType = str(node["class_type"]);
    if (!classType) continue;
    if (classType === "LoraLoader" || classType === "LoraLoaderModelOnly") {
      const inputs = node["inputs"];
      const file = isRecord(inputs) ? str(inputs["lora_name"]) : undefined;
      labels.set(nodeId, `Loading LoRA: ${file?.replace(/\.safetensors$/, "") ?? "LoRA"}`);
      continue;
    }
    const label = STAGE_LABELS[classType];
    if (label) labels.set(nodeId, label);
  }
  return labels;
}

/**
 * Map one ComfyUI WebSocket message onto the bot's event model. With
 * `labels`, `executing` messages for known nodes become progress messages.
 */
export function translateComfyMessage(message: ComfyMessage, labels?: NodeLabels): ComfyUpdate | null {
  const data = message.data;
  switch (message.type) {
    case "execution_start":
      return { kind: "event", event: { type: "started" } };

    case "progress": {
      const value = num(data["value"]) ?? 0;
      const max = num(data["max"]) ?? 0;
      const fraction = max > 0 ? Math.min(1, Math.max(0, value / max)) : 0;
      return { kind: "event", event: { type: "progress", fraction, message: `Step ${value}/${max}` } };
    }

    case "executing": {
      // node: null means the whole prompt finished
      if (data["node"] === null) return { kind: "complete" };
      const node = str(data["node"]);
      const label = node === undefined ? undefined : labels?.get(node);
      return label ? { kind: "event", event: { type: "progress", message: label } } : null;
    }

    case "execution_success":
      return { kind: "complete" };

    case "execution_cached": {
      const nodes = Array.isArray(data["nodes"]) ? data["nodes"].length : 0;
      return {
        kind: "event",
        event: { type: "progress", fraction: 0, message: `Using cached results for ${nodes} node(s)` },
      };
    }

    case "execution_error": {
      const nodeType = str(data["node_type"]) ?? "unknown node";
      const detail = str(data["exception_message"])?.trim() || "execution error";
      return {
        kind: "event",
        event: { type: "failed", error: new BackendRejectedError(`${nodeType}: ${detail}`) },
      };
    }

    case "execution_interrupted":
      return {
        kind: "event",
        event: { type: "failed", error: new BackendRejectedError("Generation was interrupted on the backend") },
      };

    default:
      return null;
  }
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export interface ComfySessionOptions {
  baseUrl: string;
  reconnectDelayMs?: number;
  /** Unclaimed prompt buffers kept before the oldest is dropped. */
  maxOrphans?: number;
}

/**
 * The single WebSocket connection to ComfyUI. Messages are routed per prompt
 * id; messages that arrive before anyone asks for a prompt are buffered.
 */
export class ComfySession {
  readonly clientId = uuidv4();
  private socket: WebSocket | null = null;
  private readonly channels = new Map<string, EventChannel<ComfyMessage>>();
  private reconnectTimer: NodeJS.Timeout | null = null;
  private closed = false;
  private readonly reconnectDelayMs: number;
  private readonly maxOrphans: number;
  private readonly claimed = new Set<string>();
  private readonly reconnectListeners = new Set<() => void>();

  constructor(private readonly options: ComfySessionOptions) {
    this.reconnectDelayMs = options.reconnectDelayMs ?? 3_000;
    this.maxOrphans = options.maxOrphans ?? 32;
  }

  get url(): string {
    const wsBase = this.options.baseUrl.replace(/^http/, "ws").replace(/\/$/, "");
    return `${wsBase}/ws?clientId=${encodeURIComponent(this.clientId)}`;
  }

  get connected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  /** Open the socket and resolve once it is connected. */
  connect(): Promise<void> {
    this.closed = false;
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.url);
      this.socket = socket;
      let opened = false;

      socket.on("open", () => {
        opened = true;
        logger.info({ clientId: this.clientId }, "ComfyUI WebSocket connected");
        resolve();
      });
      socket.on("message", (data, isBinary) => {
        // Binary frames are latent previews
        if (!isBinary) this.dispatch(data.toString());
      });
      socket.on("error", (err) => {
        logger.warn({ err }, "ComfyUI WebSocket error");
        if (!opened) reject(err);
      });
      socket.on("close", (code) => {
        if (this.socket === socket) this.socket = null;
        if (!opened) return;
        logger.warn({ code }, "ComfyUI WebSocket closed");
        this.scheduleReconnect();
      });
    });
  }

  /** Connect, retrying in the background until the socket opens or `close()` is called. */
  start(): void {
    this.connect().catch((err: unknown) => {
      logger.warn({ err, delayMs: this.reconnectDelayMs }, "ComfyUI WebSocket connect failed");
      this.scheduleReconnect();
    });
  }

  /** Called after each successful reconnect, so callers can re-check in-flight prompts. */
  onReconnect(listener: () => void): () => void {
    this.reconnectListeners.add(listener);
    return () => {
      this.reconnectListeners.delete(listener);
    };
  }

  /**
   * Messages for `promptId`, including any buffered before this call. The
   * stream never ends by itself; the caller stops iterating (which releases
   * the buffer) once it has seen a terminal message.
   */
  messages(promptId: string): AsyncIterable<ComfyMessage> {
    this.claimed.add(promptId);
    return this.channelFor(promptId);
  }

  /** Inject a message as if it had arrived on the socket. */
  push(promptId: string, message: ComfyMessage): void {
    this.channels.get(promptId)?.push(message);
  }

  close(): void {
    this.closed = true;
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = null;
    for (const channel of [...this.channels.values()]) channel.close();
    this.socket?.close();
    this.socket = null;
  }

  /** Route one raw text frame. Exposed for tests. */
  dispatch(raw: string): void {
    const message = parseComfyMessage(raw);
    if (!message) {
      logger.debug({ raw: raw.slice(0, 200) }, "Ignoring unreadable ComfyUI message");
      return;
    }
    const promptId = promptIdOf(message);
    if (!promptId) return;
    this.channelFor(promptId).push(message);
  }

  private channelFor(promptId: string): EventChannel<ComfyMessage> {
    let channel = this.channels.get(promptId);
    if (!channel) {
      channel = new EventChannel<ComfyMessage>(() => {
        this.channels.delete(promptId);
        this.claimed.delete(promptId);
      });
      this.channels.set(promptId, channel);
      this.dropOrphans();
    }
    return channel;
  }

  // Prompts submitted by other bots sharing this ComfyUI never get claimed.
  private dropOrphans(): void {
    const orphans = [...this.channels.keys()].filter((id) => !this.claimed.has(id));
    for (const id of orphans.slice(0, Math.max(0, orphans.length - this.maxOrphans))) {
      this.channels.get(id)?.close();
    }
  }

  private scheduleReconnect(): void {
    if (this.closed || this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().then(
        () => {
          for (const listener of [...this.reconnectListeners]) listener();
        },
        (err: unknown) => {
          logger.warn({ err, delayMs: this.reconnectDelayMs }, "ComfyUI WebSocket reconnect failed");
          this.scheduleReconnect();
        },
      );
    }, this.reconnectDelayMs);
    this.reconnectTimer.unref();
  }
}
