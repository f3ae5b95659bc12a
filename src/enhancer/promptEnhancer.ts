import { EnhancementError, FluxcordError, ValidationError } from "../errors.js";
import { logger } from "../logger.js";
import type { EnhancementProvider } from "./providers.js";

export interface EnhancementResult {
  originalPrompt: string;
  enhancedPrompt: string;
  creativity: number;
}

export const MIN_CREATIVITY = 1;
export const MAX_CREATIVITY = 10;

const SYSTEM_PROMPT =
  "You rewrite prompts for a text-to-image model. Reply with the rewritten prompt only: " +
  "no preamble, no quotes, no explanations, no lists. Keep it under 120 words.";

// Upper bound of each band -> how far the rewrite may stray from the input.
const INSTRUCTION_TIERS: Array<[maxLevel: number, instruction: string]> = [
  [3, "Keep the subject, composition and wording. Only add missing detail about lighting, materials and image quality."],
  [6, "Keep the subject and intent. Expand the scene with concrete visual detail, style and atmosphere."],
  [9, "Keep the core subject. You may change setting, style and composition to make a more striking image."],
  [10, "Treat the prompt as loose inspiration. Reinterpret it freely into an original, vivid image description."],
];

export function instructionFor(creativity: number): string {
  for (const [maxLevel, instruction] of INSTRUCTION_TIERS) {
    if (creativity <= maxLevel) return instruction;
  }
  return INSTRUCTION_TIERS[INSTRUCTION_TIERS.length - 1][1];
}

/** Sampling temperature: 0.1 per creativity level. */
export function temperatureFor(creativity: number): number {
  return Math.round(creativity) / 10;
}

/** Strip the wrapping that chat models add despite being told not to. */
export function cleanCompletion(text: string): string {
  let out = text.trim();
  out = out.replace(/^(enhanced|rewritten|improved)?\s*prompt\s*:\s*/i, "");
  if (out.length >= 2 && /^["'`]/.test(out) && out.endsWith(out[0])) out = out.slice(1, -1);
  return out.trim();
}

export class PromptEnhancer {
  constructor(
    private readonly provider: EnhancementProvider,
    private readonly options: { timeoutMs: number; maxTokens?: number },
  ) {}

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Rewrite `prompt` at the given creativity. Level 1 returns the prompt
   * untouched without calling the provider.
   */
  async enhance(prompt: string, creativity: number): Promise<EnhancementResult> {
    if (!Number.isInteger(creativity) || creativity < MIN_CREATIVITY || creativity > MAX_CREATIVITY) {
      throw new ValidationError([`Creativity must be a whole number from ${MIN_CREATIVITY} to ${MAX_CREATIVITY}.`]);
    }
    if (creativity === MIN_CREATIVITY) {
      return { originalPrompt: prompt, enhancedPrompt: prompt, creativity };
    }

    const signal = AbortSignal.timeout(this.options.timeoutMs);
    const started = Date.now();
    let text: string;
    try {
      text = await this.provider.complete(
        {
          system: `${SYSTEM_PROMPT}\n${instructionFor(creativity)}`,
          user: prompt,
          temperature: temperatureFor(creativity),
          maxTokens: this.options.maxTokens ?? 300,
        },
        signal,
      );
    } catch (err) {
      if (signal.aborted) {
        throw new EnhancementError(`${this.provider.name} did not answer within ${this.options.timeoutMs}ms`, {
          cause: err,
        });
      }
      if (err instanceof FluxcordError) throw err;
      const detail = err instanceof Error ? err.message : String(err);
      throw new EnhancementError(`${this.provider.name} request failed: ${detail}`, { cause: err });
    }

    const enhancedPrompt = cleanCompletion(text);
    if (!enhancedPrompt) throw new EnhancementError(`${this.provider.name} returned an empty completion`);

    logger.info(
      { provider: this.provider.name, creativity, ms: Date.now() - started, length: enhancedPrompt.length },
      "Prompt enhanced",
    );
    return { originalPrompt: prompt, enhancedPrompt, creativity };
  }
}
