import type { ButtonInteraction, Client, Interaction, ModalSubmitInteraction } from "discord.js";
import { PermissionFlagsBits } from "discord.js";
import { ValidationError } from "../../errors.js";
import { logger } from "../../logger.js";
import type { GenerationRequest } from "../../queue/types.js";
import { commands } from "../commands/index.js";
import { CUSTOM_ID, buildFormPayload, deleteDraft, getDraft, mergeDraft } from "../components/formEmbed.js";
import { buildLoraStrengthModal, parseStrengths } from "../components/loraModal.js";
import { buildPromptModal } from "../components/promptModal.js";
import { isChannelAllowed, type BotContext } from "../context.js";
import { submitAndTrack } from "../generation.js";
import { deriveRequest, parseGenerationRequest, randomSeed, type DraftParams } from "../requestParser.js";

const SESSION_EXPIRED = "Your session has expired. Run `/imagine` again.";
const CHANNEL_REFUSED = "This command can only be used in designated generation channels.";

/** Split `${prefix}:${jobId}` custom ids. */
function jobIdFor(customId: string, prefix: string): string | null {
  return customId.startsWith(prefix + ":") ? customId.slice(prefix.length + 1) : null;
}

function issueList(err: ValidationError): string {
  return `Please fix the following:\n${err.issues.map((i) => `• ${i}`).join("\n")}`;
}

export function createInteractionHandler(ctx: BotContext, client: Client) {
  return async function onInteractionCreate(interaction: Interaction): Promise<void> {
    if (!interaction.isRepliable()) return;

    if (!isChannelAllowed(ctx, interaction.channelId)) {
      await interaction.reply({ content: CHANNEL_REFUSED, ephemeral: true });
      return;
    }

    // -------------------------------------------------------------------------
    // 1. Slash commands
    // -------------------------------------------------------------------------
    if (interaction.isChatInputCommand()) {
      const command = commands.get(interaction.commandName);
      if (command) await command.execute(interaction, ctx);
      return;
    }

    // -------------------------------------------------------------------------
    // 2. String select menus on the draft form
    // -------------------------------------------------------------------------
    if (interaction.isStringSelectMenu()) {
      const userId = interaction.user.id;
      const draft = getDraft(userId);
      if (!draft) {
        await interaction.reply({ content: SESSION_EXPIRED, ephemeral: true });
        return;
      }

      let updated: DraftParams;
      if (interaction.customId === CUSTOM_ID.SELECT_RESOLUTION) {
        updated = mergeDraft(userId, { resolution: interaction.values[0] ?? draft.resolution });
      } else if (interaction.customId === CUSTOM_ID.SELECT_LORAS) {
        // Keep strengths already set for LoRAs that stay selected
        const loras = interaction.values.map((file) => {
          const existing = draft.loras.find((l) => l.file === file);
          const option = ctx.catalog.loras.find((l) => l.file === file);
          return { file, strength: existing?.strength ?? option?.defaultStrength ?? 1 };
        });
        updated = mergeDraft(userId, { loras });
      } else {
        return; // not ours
      }

      await interaction.update(buildFormPayload(updated, ctx.catalog, ctx.config.upscale.enabled));
      return;
    }

    // -------------------------------------------------------------------------
    // 3. Buttons
    // -------------------------------------------------------------------------
    if (interaction.isButton()) {
      await onButton(interaction, ctx, client);
      return;
    }

    // -------------------------------------------------------------------------
    // 4. Modal submits
    // -------------------------------------------------------------------------
    if (interaction.isModalSubmit()) {
      if (interaction.customId === CUSTOM_ID.MODAL_PROMPT) await onPromptModal(interaction, ctx);
      else if (interaction.customId === CUSTOM_ID.MODAL_LORA_STRENGTH) await onStrengthModal(interaction, ctx);
    }
  };
}

// ---------------------------------------------------------------------------
// Buttons
// ---------------------------------------------------------------------------

async function onButton(interaction: ButtonInteraction, ctx: BotContext, client: Client): Promise<void> {
  const userId = interaction.user.id;
  const id = interaction.customId;

  // Draft form buttons
  if (
    id === CUSTOM_ID.BTN_EDIT_PROMPT ||
    id === CUSTOM_ID.BTN_LORA_STRENGTH ||
    id === CUSTOM_ID.BTN_TOGGLE_UPSCALE ||
    id === CUSTOM_ID.BTN_GENERATE
  ) {
    const draft = getDraft(userId);
    if (!draft) {
      await interaction.reply({ content: SESSION_EXPIRED, ephemeral: true });
      return;
    }

    if (id === CUSTOM_ID.BTN_EDIT_PROMPT) {
      await interaction.showModal(buildPromptModal(draft, ctx.enhancer !== null));
      return;
    }
    if (id === CUSTOM_ID.BTN_LORA_STRENGTH) {
      if (draft.loras.length === 0) {
        await interaction.reply({ content: "Select at least one LoRA first.", ephemeral: true });
        return;
      }
      await interaction.showModal(buildLoraStrengthModal(draft, ctx.catalog));
      return;
    }
    if (id === CUSTOM_ID.BTN_TOGGLE_UPSCALE) {
      const updated = mergeDraft(userId, { upscale: !draft.upscale && ctx.config.upscale.enabled });
      await interaction.update(buildFormPayload(updated, ctx.catalog, ctx.config.upscale.enabled));
      return;
    }

    // Generate
    let request: GenerationRequest;
    try {
      request = parseGenerationRequest(draft, ctx.catalog, {
        requesterId: userId,
        guildId: interaction.guildId,
        channelId: interaction.channelId,
      });
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      await interaction.reply({ content: issueList(err), ephemeral: true });
      return;
    }

    // Acknowledge the click first; the runner edits this same ephemeral as the job progresses.
    await interaction.update({ content: "⏳ Submitting…", embeds: [], components: [] });
    deleteDraft(userId);
    await submitAndTrack(interaction, client, ctx, request);
    return;
  }

  // Cancel button on the status message
  const cancelId = jobIdFor(id, CUSTOM_ID.CANCEL_PREFIX);
  if (cancelId) {
    const job = ctx.coordinator.status(cancelId);
    if (job && job.request.requesterId !== userId) {
      await interaction.reply({ content: "Only the requester can cancel this job.", ephemeral: true });
      return;
    }
    const result = ctx.coordinator.cancel(cancelId);
    logger.info({ jobId: cancelId, userId, result }, "Cancel requested");
    if (result === "cancelled") {
      // The progress renderer edits this message to its final state
      await interaction.deferUpdate();
    } else {
      await interaction.reply({ content: "That job has already finished.", ephemeral: true });
    }
    return;
  }

  // Re-roll / Upscale on output posts
  const rerollId = jobIdFor(id, CUSTOM_ID.REROLL_PREFIX);
  const upscaleId = jobIdFor(id, CUSTOM_ID.UPSCALE_PREFIX);
  const sourceId = rerollId ?? upscaleId;
  if (sourceId) {
    const source = ctx.history.get(sourceId)?.request ?? ctx.coordinator.status(sourceId)?.request;
    if (!source) {
      await interaction.reply({ content: "Could not find the original job.", ephemeral: true });
      return;
    }
    if (source.requesterId !== userId) {
      const verb = rerollId ? "re-roll this generation" : "upscale this image";
      await interaction.reply({ content: `Only <@${source.requesterId}> can ${verb}.`, ephemeral: true });
      return;
    }
    if (upscaleId && !ctx.config.upscale.enabled) {
      await interaction.reply({ content: "Upscaling is currently disabled.", ephemeral: true });
      return;
    }
    if (upscaleId && source.upscale) {
      await interaction.reply({ content: "This image is already upscaled.", ephemeral: true });
      return;
    }

    // Re-roll: same settings, new seed. Upscale: same seed and the prompt that
    // was actually rendered, so the image is reproduced larger.
    const request = rerollId
      ? deriveRequest(source, { seed: randomSeed(), channelId: interaction.channelId })
      : deriveRequest(source, { upscale: true, creativity: null, channelId: interaction.channelId });

    await interaction.deferReply({ ephemeral: true });
    const newJobId = await submitAndTrack(interaction, client, ctx, request);
    logger.info({ newJobId, sourceJobId: sourceId, kind: rerollId ? "reroll" : "upscale" }, "Follow-up job submitted");
    return;
  }

  // Delete on output posts
  const deleteId = jobIdFor(id, CUSTOM_ID.DELETE_PREFIX);
  if (deleteId) {
    const owner = ctx.history.get(deleteId)?.request.requesterId ?? ctx.coordinator.status(deleteId)?.request.requesterId;
    const isRequester = owner === userId;
    const isAdmin = interaction.memberPermissions?.has(PermissionFlagsBits.ManageMessages) ?? false;
    if (!isRequester && !isAdmin) {
      await interaction.reply({
        content: "Only the original requester or server moderators can delete this post.",
        ephemeral: true,
      });
      return;
    }
    await interaction.deferUpdate();
    await interaction.message.delete();
    logger.info({ jobId: deleteId, userId }, "Output post deleted");
  }
}

// ---------------------------------------------------------------------------
// Modals
// ---------------------------------------------------------------------------

async function onPromptModal(interaction: ModalSubmitInteraction, ctx: BotContext): Promise<void> {
  const userId = interaction.user.id;
  const draft = getDraft(userId);
  if (!draft) {
    await interaction.reply({ content: SESSION_EXPIRED, ephemeral: true });
    return;
  }

  const candidate: DraftParams = {
    ...draft,
    prompt: interaction.fields.getTextInputValue(CUSTOM_ID.MODAL_FIELD_PROMPT),
    creativity: ctx.enhancer ? interaction.fields.getTextInputValue(CUSTOM_ID.MODAL_FIELD_CREATIVITY) : "",
    seed: interaction.fields.getTextInputValue(CUSTOM_ID.MODAL_FIELD_SEED),
  };

  // Validate now so mistakes surface before Generate
  try {
    parseGenerationRequest(candidate, ctx.catalog, {
      requesterId: userId,
      guildId: interaction.guildId,
      channelId: interaction.channelId ?? "",
    });
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    await interaction.reply({ content: issueList(err), ephemeral: true });
    return;
  }

  const updated = mergeDraft(userId, {
    prompt: candidate.prompt.trim(),
    creativity: candidate.creativity.trim(),
    seed: candidate.seed.trim(),
  });
  const payload = buildFormPayload(updated, ctx.catalog, ctx.config.upscale.enabled);

  // isFromMessage() is true when the modal was opened by the Edit Prompt button,
  // so the existing ephemeral form is updated in place. From /imagine, reply() creates it.
  if (interaction.isFromMessage()) {
    await interaction.update(payload);
  } else {
    await interaction.reply({ ...payload, ephemeral: true });
  }
}

async function onStrengthModal(interaction: ModalSubmitInteraction, ctx: BotContext): Promise<void> {
  const userId = interaction.user.id;
  const draft = getDraft(userId);
  if (!draft) {
    await interaction.reply({ content: SESSION_EXPIRED, ephemeral: true });
    return;
  }

  const result = parseStrengths(draft, (fieldId) => interaction.fields.getTextInputValue(fieldId));
  if (!result.ok) {
    await interaction.reply({ content: `Please fix the following:\n${result.issues.map((i) => `• ${i}`).join("\n")}`, ephemeral: true });
    return;
  }

  const updated = mergeDraft(userId, { loras: result.loras });
  const payload = buildFormPayload(updated, ctx.catalog, ctx.config.upscale.enabled);
  if (interaction.isFromMessage()) {
    await interaction.update(payload);
  } else {
    await interaction.reply({ ...payload, ephemeral: true });
  }
}
