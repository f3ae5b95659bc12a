import { v4 as uuidv4 } from "uuid";
import { GenerationTimeoutError, toJobError } from "../errors.js";
import { logger } from "../logger.js";
import { EventChannel, untilAborted } from "./eventChannel.js";
import {
  isTerminal,
  type BackendClient,
  type BackendEvent,
  type CancelResult,
  type GenerationRequest,
  type JobEvent,
  type JobSnapshot,
  type JobStatus,
  type WorkflowParameters,
} from "./types.js";

export interface CoordinatorOptions {
  /** Jobs admitted to the backend at once. */
  concurrency: number;
  /** Max time from submission to a terminal state. */
  timeoutMs: number;
  /** How long terminal jobs stay queryable before eviction. */
  retentionMs: number;
  negativePrompt: string;
  upscaleFactor: number;
}

export type JobListener = (event: JobEvent) => void;

interface JobRecord extends JobSnapshot {
  controller: AbortController | null;
  timer: NodeJS.Timeout | null;
}

// Forward-only ordering; terminal states share the top rank.
const RANK: Record<JobStatus, number> = {
  queued: 0,
  submitted: 1,
  running: 2,
  succeeded: 3,
  failed: 3,
  cancelled: 3,
};

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function snapshot(job: JobRecord): JobSnapshot {
  return {
    id: job.id,
    request: job.request,
    status: job.status,
    progress: job.progress,
    progressMessage: job.progressMessage,
    backendToken: job.backendToken,
    result: job.result ? [...job.result] : null,
    error: job.error ? { ...job.error } : null,
    createdAt: job.createdAt,
    submittedAt: job.submittedAt,
    startedAt: job.startedAt,
    completedAt: job.completedAt,
  };
}

// ---------------------------------------------------------------------------
// Coordinator
//
// Owns the job table and the FIFO wait list. Every status change goes through
// transition(); nothing else writes `status`.
// ---------------------------------------------------------------------------

export class JobCoordinator {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly waiting: string[] = [];
  private readonly listeners = new Set<JobListener>();
  private active = 0;
  private dispatchScheduled = false;

  constructor(
    private readonly backend: BackendClient,
    private readonly options: CoordinatorOptions,
    private readonly now: () => number = Date.now,
  ) {}

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  submit(request: GenerationRequest): string {
    const id = uuidv4();
    const job: JobRecord = {
      id,
      request: Object.freeze({ ...request, loras: Object.freeze([...request.loras]) }),
      status: "queued",
      progress: 0,
      progressMessage: null,
      backendToken: null,
      result: null,
      error: null,
      createdAt: this.now(),
      submittedAt: null,
      startedAt: null,
      completedAt: null,
      controller: null,
      timer: null,
    };
    this.jobs.set(id, job);
    this.waiting.push(id);
    logger.info({ jobId: id, userId: request.requesterId, queueLength: this.waiting.length }, "Job enqueued");
    this.emit({ type: "status", job: snapshot(job) });
    this.scheduleDispatch();
    return id;
  }

  status(jobId: string): JobSnapshot | undefined {
    const job = this.jobs.get(jobId);
    return job ? snapshot(job) : undefined;
  }

  cancel(jobId: string): CancelResult {
    const job = this.jobs.get(jobId);
    if (!job) return "not_found";
    if (isTerminal(job.status)) return "already_terminal";

    const wasQueued = job.status === "queued";
    this.transition(job, "cancelled", { progressMessage: "Cancelled" });

    if (!wasQueued) {
      job.controller?.abort();
      if (job.backendToken) this.releaseBackend(job.id, job.backendToken);
    }
    logger.info({ jobId, wasQueued }, "Job cancelled");
    return "cancelled";
  }

  /** 1-based place in the wait list, 0 once the job has left it. */
  position(jobId: string): number {
    return this.waiting.indexOf(jobId) + 1;
  }

  get queueLength(): number {
    return this.waiting.length;
  }

  get activeCount(): number {
    return this.active;
  }

  /**
   * Finite stream of a job's changes: the current snapshot first, then every
   * status or progress change, ending after the terminal event.
   */
  events(jobId: string): AsyncIterable<JobEvent> {
    let unsubscribe: (() => void) | null = null;
    const channel = new EventChannel<JobEvent>(() => unsubscribe?.());

    const job = this.jobs.get(jobId);
    if (!job) {
      channel.close();
      return channel;
    }

    channel.push({ type: "status", job: snapshot(job) });
    if (isTerminal(job.status)) {
      channel.close();
      return channel;
    }

    unsubscribe = this.onUpdate((event) => {
      if (event.job.id !== jobId) return;
      channel.push(event);
      if (isTerminal(event.job.status)) channel.close();
    });
    return channel;
  }

  onUpdate(listener: JobListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Apply one backend event. Events for unknown or terminal jobs are dropped,
   * so replays and late arrivals after a cancel change nothing.
   */
  applyBackendEvent(jobId: string, event: BackendEvent): void {
    const job = this.jobs.get(jobId);
    if (!job) {
      logger.debug({ jobId, event: event.type }, "Backend event for unknown job dropped");
      return;
    }
    if (isTerminal(job.status)) {
      logger.debug({ jobId, event: event.type, status: job.status }, "Backend event for finished job dropped");
      return;
    }

    switch (event.type) {
      case "started":
        this.markRunning(job);
        return;
      case "progress":
        this.markRunning(job);
        if (event.fraction !== undefined) job.progress = clamp01(event.fraction);
        if (event.message !== undefined) job.progressMessage = event.message;
        this.emit({ type: "progress", job: snapshot(job) });
        return;
      case "succeeded":
        this.markRunning(job);
        this.transition(job, "succeeded", { result: event.images, progress: 1, progressMessage: null });
        return;
      case "failed":
        this.fail(job, event.error);
        return;
    }
  }

  /** Drop a finished job once its result has been delivered. */
  release(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || !isTerminal(job.status)) return false;
    this.jobs.delete(jobId);
    return true;
  }

  /** Drop terminal jobs older than the retention window. Returns the count removed. */
  evictExpired(): number {
    const cutoff = this.now() - this.options.retentionMs;
    let removed = 0;
    for (const [id, job] of this.jobs) {
      if (isTerminal(job.status) && job.completedAt !== null && job.completedAt <= cutoff) {
        this.jobs.delete(id);
        removed++;
      }
    }
    if (removed > 0) logger.debug({ removed }, "Evicted expired jobs");
    return removed;
  }

  /** Cancel everything still live. Used on shutdown. */
  stop(): void {
    for (const job of this.jobs.values()) {
      if (!isTerminal(job.status)) this.cancel(job.id);
    }
  }

  // -------------------------------------------------------------------------
  // Runner
  // -------------------------------------------------------------------------

  private scheduleDispatch(): void {
    if (this.dispatchScheduled) return;
    this.dispatchScheduled = true;
    setImmediate(() => {
      this.dispatchScheduled = false;
      this.dispatch();
    });
  }

  private dispatch(): void {
    while (this.active < this.options.concurrency && this.waiting.length > 0) {
      const id = this.waiting.shift();
      const job = id === undefined ? undefined : this.jobs.get(id);
      if (!job || job.status !== "queued") continue;

      this.active++;
      this.run(job).catch((err: unknown) => {
        logger.error({ jobId: job.id, err }, "Runner: unexpected error");
      });
    }
  }

  private async run(job: JobRecord): Promise<void> {
    const controller = new AbortController();
    job.controller = controller;
    this.transition(job, "submitted", { submittedAt: this.now() });
    job.timer = setTimeout(() => this.expire(job), this.options.timeoutMs);
    job.timer.unref();
    logger.info({ jobId: job.id }, "Runner: submitting job");

    try {
      const token = await this.backend.submit(this.toWorkflowParameters(job.request), controller.signal);
      if (isTerminal(job.status)) {
        // Cancelled or timed out while the submission was in flight.
        this.releaseBackend(job.id, token);
        return;
      }
      job.backendToken = token;

      for await (const event of untilAborted(this.backend.events(token, controller.signal), controller.signal)) {
        this.applyBackendEvent(job.id, event);
        if (isTerminal(job.status)) break;
      }

      if (!isTerminal(job.status)) {
        this.fail(job, new Error("Backend event stream ended without a result"));
      }
    } catch (err) {
      if (isTerminal(job.status)) {
        logger.debug({ jobId: job.id, err }, "Runner: error after job finished ignored");
      } else {
        this.fail(job, err);
      }
    } finally {
      if (job.timer) clearTimeout(job.timer);
      job.timer = null;
      job.controller = null;
      this.active--;
      logger.debug({ jobId: job.id, status: job.status, active: this.active }, "Runner: slot released");
      this.scheduleDispatch();
    }
  }

  private expire(job: JobRecord): void {
    if (isTerminal(job.status)) return;
    logger.warn({ jobId: job.id, timeoutMs: this.options.timeoutMs }, "Job timed out");
    this.fail(job, new GenerationTimeoutError(this.options.timeoutMs));
    job.controller?.abort();
    if (job.backendToken) this.releaseBackend(job.id, job.backendToken);
  }

  private releaseBackend(jobId: string, token: string): void {
    this.backend.cancel(token).then(
      (released) => logger.debug({ jobId, promptId: token, released }, "Backend job released"),
      (err: unknown) => logger.warn({ jobId, promptId: token, err }, "Failed to release backend job"),
    );
  }

  private toWorkflowParameters(request: GenerationRequest): WorkflowParameters {
    return {
      prompt: request.prompt,
      negativePrompt: this.options.negativePrompt,
      width: request.resolution.width,
      height: request.resolution.height,
      loras: request.loras,
      upscaleFactor: request.upscale ? this.options.upscaleFactor : 1,
      seed: request.seed,
    };
  }

  // -------------------------------------------------------------------------
  // State transitions
  // -------------------------------------------------------------------------

  private markRunning(job: JobRecord): void {
    if (job.status === "submitted") {
      this.transition(job, "running", { startedAt: this.now() });
    }
  }

  private fail(job: JobRecord, err: unknown): void {
    const error = toJobError(err);
    if (this.transition(job, "failed", { error, progressMessage: null })) {
      logger.error({ jobId: job.id, code: error.code, err: error.message }, "Job failed");
    }
  }

  private transition(
    job: JobRecord,
    next: JobStatus,
    patch: Partial<Pick<JobSnapshot, "progress" | "progressMessage" | "result" | "error" | "submittedAt" | "startedAt">>,
  ): boolean {
    if (RANK[next] <= RANK[job.status]) {
      logger.debug({ jobId: job.id, from: job.status, to: next }, "Ignoring backward status transition");
      return false;
    }

    Object.assign(job, patch);
    const from = job.status;
    job.status = next;

    if (isTerminal(next)) {
      job.completedAt = this.now();
      if (job.timer) clearTimeout(job.timer);
      job.timer = null;
      const idx = this.waiting.indexOf(job.id);
      if (idx !== -1) this.waiting.splice(idx, 1);
    }

    logger.debug({ jobId: job.id, from, to: next }, "Job status changed");
    this.emit({ type: "status", job: snapshot(job) });
    return true;
  }

  private emit(event: JobEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (err) {
        logger.error({ jobId: event.job.id, err }, "Job listener threw");
      }
    }
  }
}
