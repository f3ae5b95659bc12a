import { request } from "undici";
import { z } from "zod";
import type { EnhancerProviderName } from "../config.js";
import { EnhancementError } from "../errors.js";
import { logger } from "../logger.js";

export interface CompletionRequest {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

/** One LLM API. Implementations return the completion text as-is. */
export interface EnhancementProvider {
  readonly name: EnhancerProviderName;
  complete(req: CompletionRequest, signal: AbortSignal): Promise<string>;
}

export interface ProviderSettings {
  provider: EnhancerProviderName;
  baseUrl: string;
  apiKey: string;
  model: string;
}

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
});

const AnthropicMessageSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

const GeminiSchema = z.object({
  candidates: z
    .array(z.object({ content: z.object({ parts: z.array(z.object({ text: z.string().optional() })) }) }))
    .min(1),
});

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

async function postJson(
  provider: EnhancerProviderName,
  url: string,
  headers: Record<string, string>,
  payload: unknown,
  signal: AbortSignal,
): Promise<unknown> {
  const { statusCode, body } = await request(url, {
    method: "POST",
    headers: { "content-type": "application/json", ...headers },
    body: JSON.stringify(payload),
    signal,
  });
  if (statusCode < 200 || statusCode >= 300) {
    const text = await body.text();
    logger.warn({ provider, statusCode, body: text.slice(0, 300) }, "Enhancer provider returned an error");
    throw new EnhancementError(`${provider} returned HTTP ${statusCode}`);
  }
  return body.json();
}

function parseOrThrow<T>(provider: EnhancerProviderName, schema: z.ZodType<T>, data: unknown): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new EnhancementError(`${provider} returned an unexpected response shape`);
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

/** LM Studio and OpenAI share the chat-completions API. */
class ChatCompletionsProvider implements EnhancementProvider {
  constructor(readonly name: "lmstudio" | "openai", private readonly settings: ProviderSettings) {}

  async complete(req: CompletionRequest, signal: AbortSignal): Promise<string> {
    const headers: Record<string, string> = {};
    if (this.settings.apiKey) headers["authorization"] = `Bearer ${this.settings.apiKey}`;
    const payload: Record<string, unknown> = {
      messages: [
        { role: "system", content: req.system },
        { role: "user", content: req.user },
      ],
      temperature: req.temperature,
      max_tokens: req.maxTokens,
    };
    // LM Studio answers with whichever model is loaded when none is named
    if (this.settings.model) payload["model"] = this.settings.model;

    const data = await postJson(this.name, `${this.settings.baseUrl}/v1/chat/completions`, headers, payload, signal);
    return parseOrThrow(this.name, ChatCompletionSchema, data).choices[0].message.content ?? "";
  }
}

class AnthropicProvider implements EnhancementProvider {
  readonly name = "anthropic";

  constructor(private readonly settings: ProviderSettings) {}

  async complete(req: CompletionRequest, signal: AbortSignal): Promise<string> {
    const data = await postJson(
      this.name,
      `${this.settings.baseUrl}/v1/messages`,
      { "x-api-key": this.settings.apiKey, "anthropic-version": "2023-06-01" },
      {
        model: this.settings.model,
        system: req.system,
        messages: [{ role: "user", content: req.user }],
        temperature: req.temperature,
        max_tokens: req.maxTokens,
      },
      signal,
    );
    return parseOrThrow(this.name, AnthropicMessageSchema, data)
      .content.filter((block) => block.type === "text")
      .map((block) => block.text ?? "")
      .join("");
  }
}

class GeminiProvider implements EnhancementProvider {
  readonly name = "gemini";

  constructor(private readonly settings: ProviderSettings) {}

  async complete(req: CompletionRequest, signal: AbortSignal): Promise<string> {
    const url = `${this.settings.baseUrl}/v1beta/models/${encodeURIComponent(this.settings.model)}:generateContent`;
    const data = await postJson(
      this.name,
      url,
      { "x-goog-api-key": this.settings.apiKey },
      {
        systemInstruction: { parts: [{ text: req.system }] },
        contents: [{ role: "user", parts: [{ text: req.user }] }],
        generationConfig: { temperature: req.temperature, maxOutputTokens: req.maxTokens },
      },
      signal,
    );
    return parseOrThrow(this.name, GeminiSchema, data)
      .candidates[0].content.parts.map((part) => part.text ?? "")
      .join("");
  }
}

/** Build the configured provider, or null when enhancement is off. */
export function createProvider(settings: ProviderSettings): EnhancementProvider | null {
  switch (settings.provider) {
    case "none":
      return null;
    case "lmstudio":
    case "openai":
      return new ChatCompletionsProvider(settings.provider, settings);
    case "anthropic":
      return new AnthropicProvider(settings);
    case "gemini":
      return new GeminiProvider(settings);
  }
}
