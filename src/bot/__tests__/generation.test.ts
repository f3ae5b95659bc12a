import { EnhancementError } from "../../errors.js";
import { PromptEnhancer } from "../../enhancer/promptEnhancer.js";
import type { CompletionRequest, EnhancementProvider } from "../../enhancer/providers.js";
import type { GenerationRequest } from "../../queue/types.js";
import { applyEnhancement } from "../generation.js";
import { deriveRequest } from "../requestParser.js";

function provider(reply: () => Promise<string>): EnhancementProvider & { calls: CompletionRequest[] } {
  const calls: CompletionRequest[] = [];
  return {
    name: "openai",
    calls,
    complete(req) {
      calls.push(req);
      return reply();
    },
  };
}

const REQUEST: GenerationRequest = {
  requesterId: "user-1",
  guildId: null,
  channelId: "channel-1",
  prompt: "a tram in the rain",
  originalPrompt: "a tram in the rain",
  resolution: { key: "1024x1024", label: "Square (1:1)", width: 1024, height: 1024 },
  loras: [],
  upscale: false,
  creativity: 6,
  seed: 5,
};

describe("applyEnhancement", () => {
  it("passes the request through when no enhancer is configured", async () => {
    await expect(applyEnhancement(null, "abort", REQUEST)).resolves.toEqual({ ok: true, request: REQUEST, notice: null });
  });

  it("passes the request through when no creativity was given", async () => {
    const fake = provider(() => Promise.resolve("unused"));
    const enhancer = new PromptEnhancer(fake, { timeoutMs: 1_000 });
    const outcome = await applyEnhancement(enhancer, "fallback", { ...REQUEST, creativity: null });

    expect(outcome).toEqual({ ok: true, request: { ...REQUEST, creativity: null }, notice: null });
    expect(fake.calls).toHaveLength(0);
  });

  it("generates from the enhanced prompt and keeps the typed one", async () => {
    const enhancer = new PromptEnhancer(provider(() => Promise.resolve("a red tram in heavy rain, neon reflections")), {
      timeoutMs: 1_000,
    });
    const outcome = await applyEnhancement(enhancer, "fallback", REQUEST);

    if (!outcome.ok) throw new Error(outcome.message);
    expect(outcome.request.prompt).toBe("a red tram in heavy rain, neon reflections");
    expect(outcome.request.originalPrompt).toBe("a tram in the rain");
    expect(outcome.notice).toBeNull();
  });

  it("falls back to the typed prompt with a notice", async () => {
    const enhancer = new PromptEnhancer(provider(() => Promise.reject(new EnhancementError("openai returned HTTP 429"))), {
      timeoutMs: 1_000,
    });
    await expect(applyEnhancement(enhancer, "fallback", REQUEST)).resolves.toEqual({
      ok: true,
      request: REQUEST,
      notice: "⚠️ Prompt enhancement failed. Using your original prompt.\n",
    });
  });

  it("refuses the request under the abort policy", async () => {
    const enhancer = new PromptEnhancer(provider(() => Promise.reject(new EnhancementError("openai returned HTTP 429"))), {
      timeoutMs: 1_000,
    });
    await expect(applyEnhancement(enhancer, "abort", REQUEST)).resolves.toEqual({
      ok: false,
      message: "❌ Prompt enhancement failed. Your request was not queued.",
    });
  });

  describe("follow-ups of an enhanced generation", () => {
    const ENHANCED: GenerationRequest = {
      ...REQUEST,
      prompt: "a red tram in heavy rain, neon reflections",
      originalPrompt: "a tram in the rain",
    };

    it("re-rolls by rewriting the typed prompt, not the earlier rewrite", async () => {
      const fake = provider(() => Promise.resolve("a vintage tram in a downpour"));
      const enhancer = new PromptEnhancer(fake, { timeoutMs: 1_000 });
      const outcome = await applyEnhancement(enhancer, "fallback", deriveRequest(ENHANCED, { seed: 9 }));

      expect(fake.calls.map((c) => c.user)).toEqual(["a tram in the rain"]);
      if (!outcome.ok) throw new Error(outcome.message);
      expect(outcome.request.prompt).toBe("a vintage tram in a downpour");
      expect(outcome.request.originalPrompt).toBe("a tram in the rain");
    });

    it("upscales with the prompt that was rendered and no new enhancement", async () => {
      const fake = provider(() => Promise.resolve("unused"));
      const enhancer = new PromptEnhancer(fake, { timeoutMs: 1_000 });
      const upscale = deriveRequest(ENHANCED, { upscale: true, creativity: null });
      const outcome = await applyEnhancement(enhancer, "fallback", upscale);

      expect(fake.calls).toHaveLength(0);
      if (!outcome.ok) throw new Error(outcome.message);
      expect(outcome.request.prompt).toBe("a red tram in heavy rain, neon reflections");
      expect(outcome.request.seed).toBe(5);
      expect(outcome.request.upscale).toBe(true);
    });

    it("falls back to the typed prompt when a re-roll enhancement fails", async () => {
      const enhancer = new PromptEnhancer(provider(() => Promise.reject(new EnhancementError("openai returned HTTP 500"))), {
        timeoutMs: 1_000,
      });
      const outcome = await applyEnhancement(enhancer, "fallback", ENHANCED);

      if (!outcome.ok) throw new Error(outcome.message);
      expect(outcome.request.prompt).toBe("a tram in the rain");
    });
  });
});
