import type { Client, MessageComponentInteraction } from "discord.js";
import { toJobError } from "../errors.js";
import type { PromptEnhancer } from "../enhancer/promptEnhancer.js";
import { logger } from "../logger.js";
import type { GenerationRequest } from "../queue/types.js";
import { buildCancelRow, queuedMessage } from "./components/resultEmbed.js";
import type { BotContext } from "./context.js";
import { DiscordProgressSink } from "./discordSink.js";
import { renderJobProgress } from "./progressRenderer.js";
import { withEnhancedPrompt } from "./requestParser.js";

export type EnhancementOutcome =
  | { ok: true; request: GenerationRequest; notice: string | null }
  | { ok: false; message: string };

/**
 * Run the enhancer for requests that asked for it. The typed prompt is
 * always the input, so a re-roll of an enhanced request is rewritten afresh
 * rather than rewritten twice. With the "fallback" policy a failure keeps the
 * typed prompt and adds a notice; with "abort" the request is refused.
 */
export async function applyEnhancement(
  enhancer: PromptEnhancer | null,
  policy: "fallback" | "abort",
  request: GenerationRequest,
): Promise<EnhancementOutcome> {
  if (!enhancer || request.creativity === null) return { ok: true, request, notice: null };

  try {
    const result = await enhancer.enhance(request.originalPrompt, request.creativity);
    return { ok: true, request: withEnhancedPrompt(request, result.enhancedPrompt), notice: null };
  } catch (err) {
    const error = toJobError(err);
    logger.warn({ userId: request.requesterId, code: error.code, err: error.message, policy }, "Prompt enhancement failed");
    if (policy === "abort") {
      return { ok: false, message: `❌ ${error.userMessage} Your request was not queued.` };
    }
    return {
      ok: true,
      request: withEnhancedPrompt(request, request.originalPrompt),
      notice: `⚠️ ${error.userMessage} Using your original prompt.\n`,
    };
  }
}

/**
 * Enhance, submit and follow one request. `interaction` must already be
 * acknowledged; its reply becomes the job's status message. Resolves once
 * the job is queued; progress rendering continues in the background.
 */
export async function submitAndTrack(
  interaction: MessageComponentInteraction,
  client: Client,
  ctx: BotContext,
  request: GenerationRequest,
): Promise<string | null> {
  if (ctx.enhancer && request.creativity !== null && request.creativity > 1) {
    await interaction.editReply({ content: "✨ Enhancing your prompt…", embeds: [], components: [] });
  }
  const outcome = await applyEnhancement(ctx.enhancer, ctx.config.enhancer.failurePolicy, request);
  if (!outcome.ok) {
    await interaction.editReply({ content: outcome.message, embeds: [], components: [] });
    return null;
  }

  const { coordinator } = ctx;
  const jobId = coordinator.submit(outcome.request);
  const prefix = outcome.notice ?? "";
  await interaction.editReply({
    content: prefix + queuedMessage(coordinator.position(jobId)),
    embeds: [],
    components: [buildCancelRow(jobId)],
  });

  const sink = new DiscordProgressSink(client, interaction, ctx.config.upscale.enabled);
  renderJobProgress(coordinator.events(jobId), sink, { tokenIssuedAt: interaction.createdTimestamp, prefix })
    .then((final) => {
      logger.debug({ jobId, status: final?.status }, "Progress rendering finished");
      coordinator.release(jobId);
    })
    .catch((err: unknown) => logger.error({ jobId, err }, "Progress rendering failed"));

  logger.info({ jobId, userId: request.requesterId }, "Job submitted by user");
  return jobId;
}
