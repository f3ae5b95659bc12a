import { BackendRejectedError } from "../../errors.js";
import { logger } from "../../logger.js";
import { EventChannel } from "../eventChannel.js";
import { JobCoordinator, type CoordinatorOptions } from "../jobQueue.js";
import type { BackendClient, BackendEvent, GenerationRequest, JobEvent, WorkflowParameters } from "../types.js";

class FakeBackend implements BackendClient {
  readonly submitted: WorkflowParameters[] = [];
  readonly cancelled: string[] = [];
  private readonly streams = new Map<string, EventChannel<BackendEvent>>();
  submitImpl: (n: number) => Promise<string> = (n) => Promise.resolve(`prompt-${n}`);

  submit(params: WorkflowParameters): Promise<string> {
    this.submitted.push(params);
    return this.submitImpl(this.submitted.length);
  }

  events(token: string): AsyncIterable<BackendEvent> {
    return this.stream(token);
  }

  cancel(token: string): Promise<boolean> {
    this.cancelled.push(token);
    return Promise.resolve(true);
  }

  emit(token: string, event: BackendEvent): void {
    this.stream(token).push(event);
  }

  private stream(token: string): EventChannel<BackendEvent> {
    let channel = this.streams.get(token);
    if (!channel) {
      channel = new EventChannel<BackendEvent>();
      this.streams.set(token, channel);
    }
    return channel;
  }
}

const OPTIONS: CoordinatorOptions = {
  concurrency: 1,
  timeoutMs: 60_000,
  retentionMs: 1_000,
  negativePrompt: "blurry",
  upscaleFactor: 2,
};

function request(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    requesterId: "user-1",
    guildId: "guild-1",
    channelId: "channel-1",
    prompt: "a lighthouse at dusk",
    originalPrompt: "a lighthouse at dusk",
    resolution: { key: "1024x1024", label: "Square (1:1)", width: 1024, height: 1024 },
    loras: [],
    upscale: false,
    creativity: null,
    seed: 42,
    ...overrides,
  };
}

const IMAGE = { filename: "out_00001_.png", data: Buffer.from("png") };

/** Let queued setImmediate callbacks and their promise chains run. */
async function settle(): Promise<void> {
  for (let i = 0; i < 5; i++) await new Promise((resolve) => setImmediate(resolve));
}

async function collect(events: AsyncIterable<JobEvent>): Promise<JobEvent[]> {
  const out: JobEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

describe("JobCoordinator", () => {
  let backend: FakeBackend;

  beforeEach(() => {
    backend = new FakeBackend();
  });

  it("moves a job through queued, submitted, running and succeeded", async () => {
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const id = coordinator.submit(request());
    const done = collect(coordinator.events(id));

    await settle();
    backend.emit("prompt-1", { type: "started" });
    backend.emit("prompt-1", { type: "progress", fraction: 0.5, message: "Step 10/20" });
    backend.emit("prompt-1", { type: "succeeded", images: [IMAGE] });

    const events = await done;
    expect(events.map((e) => `${e.type}:${e.job.status}`)).toEqual([
      "status:queued",
      "status:submitted",
      "status:running",
      "progress:running",
      "status:succeeded",
    ]);

    const job = coordinator.status(id);
    expect(job?.status).toBe("succeeded");
    expect(job?.progress).toBe(1);
    expect(job?.backendToken).toBe("prompt-1");
    expect(job?.result).toEqual([IMAGE]);
    expect(job?.completedAt).not.toBeNull();
  });

  it("passes the bound workflow parameters to the backend", async () => {
    const coordinator = new JobCoordinator(backend, OPTIONS);
    coordinator.submit(request({ upscale: true, seed: 7 }));
    await settle();

    expect(backend.submitted).toEqual([
      {
        prompt: "a lighthouse at dusk",
        negativePrompt: "blurry",
        width: 1024,
        height: 1024,
        loras: [],
        upscaleFactor: 2,
        seed: 7,
      },
    ]);
  });

  it("runs jobs in submission order with concurrency 1", async () => {
    let tick = 0;
    const coordinator = new JobCoordinator(backend, OPTIONS, () => ++tick);
    const first = coordinator.submit(request({ prompt: "first" }));
    const second = coordinator.submit(request({ prompt: "second" }));
    await settle();

    expect(backend.submitted.map((p) => p.prompt)).toEqual(["first"]);
    expect(coordinator.position(second)).toBe(1);
    expect(coordinator.activeCount).toBe(1);

    backend.emit("prompt-1", { type: "succeeded", images: [IMAGE] });
    await settle();

    expect(backend.submitted.map((p) => p.prompt)).toEqual(["first", "second"]);
    expect(coordinator.position(second)).toBe(0);

    const completedAt = coordinator.status(first)?.completedAt;
    const submittedAt = coordinator.status(second)?.submittedAt;
    if (completedAt == null || submittedAt == null) throw new Error("expected both timestamps");
    expect(submittedAt).toBeGreaterThanOrEqual(completedAt);
  });

  it("never admits more jobs than the concurrency limit", async () => {
    const coordinator = new JobCoordinator(backend, { ...OPTIONS, concurrency: 2 });
    coordinator.submit(request());
    coordinator.submit(request());
    const third = coordinator.submit(request());
    await settle();

    expect(backend.submitted).toHaveLength(2);
    expect(coordinator.activeCount).toBe(2);
    expect(coordinator.status(third)?.status).toBe("queued");
  });

  it("cancels a queued job without ever submitting it", async () => {
    const coordinator = new JobCoordinator(backend, OPTIONS);
    coordinator.submit(request({ prompt: "first" }));
    const second = coordinator.submit(request({ prompt: "second" }));
    await settle();

    expect(coordinator.cancel(second)).toBe("cancelled");
    backend.emit("prompt-1", { type: "succeeded", images: [IMAGE] });
    await settle();

    expect(backend.submitted.map((p) => p.prompt)).toEqual(["first"]);
    expect(backend.cancelled).toEqual([]);
    expect(coordinator.status(second)?.status).toBe("cancelled");
    expect(coordinator.queueLength).toBe(0);
  });

  it("releases the backend job and ignores late events after a cancel", async () => {
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const id = coordinator.submit(request());
    await settle();

    expect(coordinator.cancel(id)).toBe("cancelled");
    coordinator.applyBackendEvent(id, { type: "succeeded", images: [IMAGE] });
    await settle();

    expect(coordinator.status(id)?.status).toBe("cancelled");
    expect(coordinator.status(id)?.result).toBeNull();
    expect(backend.cancelled).toEqual(["prompt-1"]);
    expect(coordinator.activeCount).toBe(0);
  });

  it("logs the released prompt id under a key the logger does not redact", async () => {
    const debug = jest.spyOn(logger, "debug");
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const id = coordinator.submit(request());
    await settle();

    coordinator.cancel(id);
    await settle();

    expect(debug).toHaveBeenCalledWith({ jobId: id, promptId: "prompt-1", released: true }, "Backend job released");
    debug.mockRestore();
  });

  it("reports cancel results for finished and unknown jobs", async () => {
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const id = coordinator.submit(request());
    await settle();
    backend.emit("prompt-1", { type: "succeeded", images: [IMAGE] });
    await settle();

    expect(coordinator.cancel(id)).toBe("already_terminal");
    expect(coordinator.cancel("no-such-job")).toBe("not_found");
  });

  it("releases a token that arrives after the job was cancelled mid-submit", async () => {
    let resolveSubmit: (token: string) => void = () => undefined;
    backend.submitImpl = () => new Promise((resolve) => (resolveSubmit = resolve));
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const id = coordinator.submit(request());
    await settle();

    expect(coordinator.status(id)?.status).toBe("submitted");
    coordinator.cancel(id);
    resolveSubmit("prompt-late");
    await settle();

    expect(backend.cancelled).toEqual(["prompt-late"]);
    expect(coordinator.status(id)?.backendToken).toBeNull();
  });

  it("fails a rejected submission without retrying it", async () => {
    backend.submitImpl = () => Promise.reject(new BackendRejectedError("CheckpointLoaderSimple: missing model"));
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const id = coordinator.submit(request());
    await settle();

    const job = coordinator.status(id);
    expect(job?.status).toBe("failed");
    expect(job?.error?.code).toBe("backend_rejected");
    expect(job?.error?.message).toBe("CheckpointLoaderSimple: missing model");
    expect(backend.submitted).toHaveLength(1);
  });

  it("wraps unexpected errors as internal failures", async () => {
    backend.submitImpl = () => Promise.reject(new Error("boom"));
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const id = coordinator.submit(request());
    await settle();

    expect(coordinator.status(id)?.error).toEqual({
      code: "internal",
      message: "boom",
      userMessage: "An unexpected error occurred.",
    });
  });

  it("times out a job that never finishes", async () => {
    const coordinator = new JobCoordinator(backend, { ...OPTIONS, timeoutMs: 30 });
    const id = coordinator.submit(request());
    await settle();
    await new Promise((resolve) => setTimeout(resolve, 60));
    await settle();

    const job = coordinator.status(id);
    expect(job?.status).toBe("failed");
    expect(job?.error?.code).toBe("timeout");
    expect(backend.cancelled).toEqual(["prompt-1"]);
    expect(coordinator.activeCount).toBe(0);
  });

  it("applies a replayed terminal event only once", async () => {
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const id = coordinator.submit(request());
    await settle();

    const terminal: string[] = [];
    coordinator.onUpdate((e) => {
      if (e.job.status === "succeeded") terminal.push(e.type);
    });
    coordinator.applyBackendEvent(id, { type: "succeeded", images: [IMAGE] });
    coordinator.applyBackendEvent(id, { type: "succeeded", images: [IMAGE, IMAGE] });
    coordinator.applyBackendEvent(id, { type: "failed", error: new Error("late") });

    expect(terminal).toEqual(["status"]);
    expect(coordinator.status(id)?.result).toHaveLength(1);
  });

  it("clamps progress into [0, 1]", async () => {
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const id = coordinator.submit(request());
    await settle();

    coordinator.applyBackendEvent(id, { type: "progress", fraction: 1.7 });
    expect(coordinator.status(id)?.progress).toBe(1);
    coordinator.applyBackendEvent(id, { type: "progress", fraction: -3 });
    expect(coordinator.status(id)?.progress).toBe(0);
  });

  it("ends the event stream of a finished job after one snapshot", async () => {
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const id = coordinator.submit(request());
    coordinator.cancel(id);

    const events = await collect(coordinator.events(id));
    expect(events.map((e) => e.job.status)).toEqual(["cancelled"]);
    expect(await collect(coordinator.events("missing"))).toEqual([]);
  });

  it("evicts finished jobs once the retention window has passed", async () => {
    let clock = 10_000;
    const coordinator = new JobCoordinator(backend, OPTIONS, () => clock);
    const id = coordinator.submit(request());
    coordinator.cancel(id);

    clock = 10_999;
    expect(coordinator.evictExpired()).toBe(0);
    clock = 11_000;
    expect(coordinator.evictExpired()).toBe(1);
    expect(coordinator.status(id)).toBeUndefined();
  });

  it("only releases finished jobs", async () => {
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const id = coordinator.submit(request());
    expect(coordinator.release(id)).toBe(false);
    coordinator.cancel(id);
    expect(coordinator.release(id)).toBe(true);
    expect(coordinator.status(id)).toBeUndefined();
  });

  it("cancels every live job on stop", async () => {
    const coordinator = new JobCoordinator(backend, OPTIONS);
    const running = coordinator.submit(request());
    const waiting = coordinator.submit(request());
    await settle();

    coordinator.stop();
    await settle();

    expect(coordinator.status(running)?.status).toBe("cancelled");
    expect(coordinator.status(waiting)?.status).toBe("cancelled");
    expect(backend.submitted).toHaveLength(1);
  });
});
