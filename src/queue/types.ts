import type { JobError } from "../errors.js";

// ---------------------------------------------------------------------------
// Core domain types shared across queue, backend, bot and DB modules
// ---------------------------------------------------------------------------

export interface ResolutionOption {
  key: string;    // "1024x1024"
  label: string;  // "Square (1:1)"
  width: number;
  height: number;
}

export interface LoraOption {
  name: string;            // display name
  file: string;            // filename in ComfyUI's loras folder
  defaultStrength: number;
}

export interface LoraSelection {
  name: string;
  file: string;
  strength: number; // 0 – 2
}

/** Immutable once handed to the coordinator. */
export interface GenerationRequest {
  readonly requesterId: string;
  readonly guildId: string | null;
  readonly channelId: string;
  readonly prompt: string;
  /** Prompt as the user typed it; equals `prompt` unless it was enhanced. */
  readonly originalPrompt: string;
  readonly resolution: Readonly<ResolutionOption>;
  readonly loras: readonly Readonly<LoraSelection>[];
  readonly upscale: boolean;
  readonly creativity: number | null; // 1–10
  readonly seed: number;              // 0–4294967295
}

export type JobStatus = "queued" | "submitted" | "running" | "succeeded" | "failed" | "cancelled";

export const TERMINAL_STATUSES: readonly JobStatus[] = ["succeeded", "failed", "cancelled"];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface GeneratedImage {
  filename: string;
  data: Buffer;
}

export interface JobSnapshot {
  id: string; // UUIDv4
  request: GenerationRequest;
  status: JobStatus;
  progress: number; // 0 – 1
  progressMessage: string | null;
  backendToken: string | null; // ComfyUI prompt_id
  result: GeneratedImage[] | null;
  error: JobError | null;
  createdAt: number; // Unix ms
  submittedAt: number | null;
  startedAt: number | null;
  completedAt: number | null;
}

export type JobEvent =
  | { type: "status"; job: JobSnapshot }
  | { type: "progress"; job: JobSnapshot };

export type CancelResult = "cancelled" | "already_terminal" | "not_found";

// ---------------------------------------------------------------------------
// Backend contract
// ---------------------------------------------------------------------------

/** Everything the backend needs to bind a workflow. */
export interface WorkflowParameters {
  prompt: string;
  negativePrompt: string;
  width: number;
  height: number;
  loras: readonly LoraSelection[];
  upscaleFactor: number; // 1 = no upscale
  seed: number;
}

export type BackendEvent =
  | { type: "started" }
  | { type: "progress"; fraction?: number; message?: string }
  | { type: "succeeded"; images: GeneratedImage[] }
  | { type: "failed"; error: Error };

export interface BackendClient {
  /** Returns the backend's token for the submitted job. */
  submit(params: WorkflowParameters, signal?: AbortSignal): Promise<string>;
  /** Finite stream: ends after a `succeeded` or `failed` event, or when `signal` aborts. */
  events(token: string, signal?: AbortSignal): AsyncIterable<BackendEvent>;
  /** Best-effort removal of the job from the backend. Resolves false when unsupported or already gone. */
  cancel(token: string): Promise<boolean>;
}
