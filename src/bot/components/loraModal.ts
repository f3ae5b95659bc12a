import {
  ActionRowBuilder,
  ModalBuilder,
  TextInputBuilder,
  TextInputStyle,
} from "discord.js";
import { z } from "zod";
import type { Catalog } from "../../catalog.js";
import { MAX_LORA_STRENGTH, MIN_LORA_STRENGTH, type DraftParams } from "../requestParser.js";
import { CUSTOM_ID } from "./formEmbed.js";

export const LoraStrengthSchema = z.coerce
  .number({ invalid_type_error: "Strength must be a number." })
  .min(MIN_LORA_STRENGTH, `Minimum strength is ${MIN_LORA_STRENGTH}.`)
  .max(MAX_LORA_STRENGTH, `Maximum strength is ${MAX_LORA_STRENGTH}.`);

export function strengthFieldId(index: number): string {
  return `${CUSTOM_ID.MODAL_FIELD_STRENGTH_PREFIX}${index}`;
}

/** One text field per selected LoRA, in selection order. */
export function buildLoraStrengthModal(draft: DraftParams, catalog: Catalog): ModalBuilder {
  const modal = new ModalBuilder().setCustomId(CUSTOM_ID.MODAL_LORA_STRENGTH).setTitle("Set LoRA Strengths");

  draft.loras.forEach((pick, index) => {
    const name = catalog.loras.find((l) => l.file === pick.file)?.name ?? pick.file;
    const input = new TextInputBuilder()
      .setCustomId(strengthFieldId(index))
      .setLabel(`${index + 1}. ${name}`.slice(0, 45))
      .setStyle(TextInputStyle.Short)
      .setRequired(true)
      .setMaxLength(5)
      .setPlaceholder(`${MIN_LORA_STRENGTH} – ${MAX_LORA_STRENGTH}`)
      .setValue(pick.strength.toFixed(2));
    modal.addComponents(new ActionRowBuilder<TextInputBuilder>().addComponents(input));
  });

  return modal;
}

/**
 * Validate the submitted strength fields. `read` returns the raw text of a
 * field. Returns the updated selections or the list of problems.
 */
export function parseStrengths(
  draft: DraftParams,
  read: (fieldId: string) => string,
): { ok: true; loras: DraftParams["loras"] } | { ok: false; issues: string[] } {
  const issues: string[] = [];
  const loras = draft.loras.map((pick, index) => {
    const parsed = LoraStrengthSchema.safeParse(read(strengthFieldId(index)));
    if (!parsed.success) {
      issues.push(`LoRA ${index + 1}: ${parsed.error.issues[0]?.message ?? "invalid strength"}`);
      return pick;
    }
    return { file: pick.file, strength: parsed.data };
  });
  return issues.length > 0 ? { ok: false, issues } : { ok: true, loras };
}
