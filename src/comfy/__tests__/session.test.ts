import { BackendRejectedError } from "../../errors.js";
import {
  ComfySession,
  parseComfyMessage,
  promptIdOf,
  stageLabels,
  translateComfyMessage,
  type ComfyMessage,
} from "../session.js";

function msg(type: string, data: Record<string, unknown> = {}): ComfyMessage {
  return { type, data };
}

async function drain(source: AsyncIterable<ComfyMessage>): Promise<string[]> {
  const types: string[] = [];
  for await (const m of source) types.push(m.type);
  return types;
}

describe("translateComfyMessage", () => {
  it("maps execution_start to started", () => {
    expect(translateComfyMessage(msg("execution_start", { prompt_id: "p" }))).toEqual({
      kind: "event",
      event: { type: "started" },
    });
  });

  it("turns sampler steps into a fraction", () => {
    expect(translateComfyMessage(msg("progress", { value: 5, max: 20 }))).toEqual({
      kind: "event",
      event: { type: "progress", fraction: 0.25, message: "Step 5/20" },
    });
  });

  it("clamps overshooting progress and handles a zero max", () => {
    const over = translateComfyMessage(msg("progress", { value: 30, max: 20 }));
    expect(over).toEqual({ kind: "event", event: { type: "progress", fraction: 1, message: "Step 30/20" } });
    const zero = translateComfyMessage(msg("progress", { value: 3, max: 0 }));
    expect(zero).toEqual({ kind: "event", event: { type: "progress", fraction: 0, message: "Step 3/0" } });
  });

  it("treats executing with a null node as completion", () => {
    expect(translateComfyMessage(msg("executing", { node: null }))).toEqual({ kind: "complete" });
    expect(translateComfyMessage(msg("executing", { node: "5" }))).toBeNull();
    expect(translateComfyMessage(msg("execution_success"))).toEqual({ kind: "complete" });
  });

  it("names the loading stage of a labelled node", () => {
    const labels = new Map([["1", "Loading main model…"]]);
    expect(translateComfyMessage(msg("executing", { node: "1" }), labels)).toEqual({
      kind: "event",
      event: { type: "progress", message: "Loading main model…" },
    });
    expect(translateComfyMessage(msg("executing", { node: "5" }), labels)).toBeNull();
  });

  it("reports cached nodes as progress", () => {
    expect(translateComfyMessage(msg("execution_cached", { nodes: ["1", "2", "3"] }))).toEqual({
      kind: "event",
      event: { type: "progress", fraction: 0, message: "Using cached results for 3 node(s)" },
    });
  });

  it("turns execution errors into rejections naming the node", () => {
    const update = translateComfyMessage(
      msg("execution_error", { node_type: "KSampler", exception_message: "  CUDA out of memory\n" }),
    );
    if (update?.kind !== "event" || update.event.type !== "failed") throw new Error("expected a failure");
    expect(update.event.error).toBeInstanceOf(BackendRejectedError);
    expect(update.event.error.message).toBe("KSampler: CUDA out of memory");
  });

  it("fills in defaults for a bare execution error", () => {
    const update = translateComfyMessage(msg("execution_error"));
    if (update?.kind !== "event" || update.event.type !== "failed") throw new Error("expected a failure");
    expect(update.event.error.message).toBe("unknown node: execution error");
  });

  it("reports interruptions as failures", () => {
    const update = translateComfyMessage(msg("execution_interrupted"));
    if (update?.kind !== "event" || update.event.type !== "failed") throw new Error("expected a failure");
    expect(update.event.error.message).toBe("Generation was interrupted on the backend");
  });

  it("ignores message types it does not know", () => {
    expect(translateComfyMessage(msg("status", { status: { exec_info: { queue_remaining: 0 } } }))).toBeNull();
  });
});

describe("stageLabels", () => {
  it("labels loaders, LoRAs and decoding by class type", () => {
    const labels = stageLabels({
      "1": { class_type: "UNETLoader", inputs: {} },
      "2": { class_type: "DualCLIPLoader", inputs: {} },
      "3": { class_type: "VAELoader", inputs: {} },
      "4": { class_type: "LoraLoader", inputs: { lora_name: "ink_wash.safetensors" } },
      "5": { class_type: "KSampler", inputs: {} },
      "6": { class_type: "VAEDecode", inputs: {} },
      "7": "not a node",
    });
    expect([...labels]).toEqual([
      ["1", "Loading main model…"],
      ["2", "Loading CLIP model…"],
      ["3", "Loading VAE…"],
      ["4", "Loading LoRA: ink_wash"],
      ["6", "Decoding image…"],
    ]);
  });
});

describe("parseComfyMessage", () => {
  it("reads type, data and prompt id", () => {
    const parsed = parseComfyMessage('{"type":"executing","data":{"node":"3","prompt_id":"p-9"}}');
    expect(parsed).toEqual({ type: "executing", data: { node: "3", prompt_id: "p-9" } });
    expect(parsed && promptIdOf(parsed)).toBe("p-9");
  });

  it("returns null for frames that are not messages", () => {
    expect(parseComfyMessage("not json")).toBeNull();
    expect(parseComfyMessage('{"data":{}}')).toBeNull();
  });
});

describe("ComfySession", () => {
  it("builds the socket URL from the HTTP base", () => {
    const session = new ComfySession({ baseUrl: "https://comfy.test:8188/" });
    expect(session.url).toBe(`wss://comfy.test:8188/ws?clientId=${session.clientId}`);
    expect(session.connected).toBe(false);
  });

  it("buffers messages that arrive before the prompt is claimed", async () => {
    const session = new ComfySession({ baseUrl: "http://comfy.test" });
    session.dispatch('{"type":"execution_start","data":{"prompt_id":"p-1"}}');
    session.dispatch('{"type":"progress","data":{"value":1,"max":4,"prompt_id":"p-1"}}');
    session.dispatch('{"type":"progress","data":{"value":1,"max":4,"prompt_id":"p-2"}}');
    session.dispatch('{"type":"status","data":{"status":{}}}');
    session.dispatch("garbage");

    const messages = session.messages("p-1");
    session.close();
    expect(await drain(messages)).toEqual(["execution_start", "progress"]);
  });

  it("drops the oldest unclaimed buffers beyond the orphan limit", async () => {
    const session = new ComfySession({ baseUrl: "http://comfy.test", maxOrphans: 2 });
    for (const id of ["a", "b", "c"]) {
      session.dispatch(JSON.stringify({ type: "execution_start", data: { prompt_id: id } }));
    }

    const dropped = session.messages("a");
    const kept = session.messages("c");
    session.close();
    expect(await drain(dropped)).toEqual([]);
    expect(await drain(kept)).toEqual(["execution_start"]);
  });

  it("delivers injected messages to a claimed prompt", async () => {
    const session = new ComfySession({ baseUrl: "http://comfy.test" });
    const messages = session.messages("p-1");
    session.push("p-1", msg("executing", { node: null, prompt_id: "p-1" }));
    session.close();
    expect(await drain(messages)).toEqual(["executing"]);
  });
});
