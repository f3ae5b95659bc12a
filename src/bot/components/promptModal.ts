import {
  ActionRowBuilder,
  ModalBuilder,
  TextInputBuilder,
  TextInputStyle,
} from "discord.js";
import { MAX_PROMPT_LENGTH, type DraftParams } from "../requestParser.js";
import { CUSTOM_ID } from "./formEmbed.js";

/**
 * Prompt modal opened by /imagine and the Edit Prompt button. The creativity
 * field only appears when a prompt enhancer is configured.
 */
export function buildPromptModal(draft: DraftParams, enhancerEnabled: boolean): ModalBuilder {
  const modal = new ModalBuilder().setCustomId(CUSTOM_ID.MODAL_PROMPT).setTitle("Describe your image");

  const promptInput = new TextInputBuilder()
    .setCustomId(CUSTOM_ID.MODAL_FIELD_PROMPT)
    .setLabel("Prompt")
    .setStyle(TextInputStyle.Paragraph)
    .setRequired(true)
    .setMaxLength(MAX_PROMPT_LENGTH)
    .setValue(draft.prompt);

  const seedInput = new TextInputBuilder()
    .setCustomId(CUSTOM_ID.MODAL_FIELD_SEED)
    .setLabel("Seed (blank or 'random' = random)")
    .setStyle(TextInputStyle.Short)
    .setRequired(false)
    .setMaxLength(10)
    .setValue(draft.seed);

  modal.addComponents(new ActionRowBuilder<TextInputBuilder>().addComponents(promptInput));

  if (enhancerEnabled) {
    const creativityInput = new TextInputBuilder()
      .setCustomId(CUSTOM_ID.MODAL_FIELD_CREATIVITY)
      .setLabel("Creativity 1–10 (blank = keep my prompt)")
      .setStyle(TextInputStyle.Short)
      .setRequired(false)
      .setMaxLength(2)
      .setValue(draft.creativity);
    modal.addComponents(new ActionRowBuilder<TextInputBuilder>().addComponents(creativityInput));
  }

  modal.addComponents(new ActionRowBuilder<TextInputBuilder>().addComponents(seedInput));
  return modal;
}
