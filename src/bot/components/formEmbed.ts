import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
  StringSelectMenuBuilder,
} from "discord.js";
import type { Catalog } from "../../catalog.js";
import { MAX_LORAS } from "../../comfy/workflowBinder.js";
import type { DraftParams } from "../requestParser.js";

// ---------------------------------------------------------------------------
// Custom ID constants
// ---------------------------------------------------------------------------

export const CUSTOM_ID = {
  SELECT_RESOLUTION: "img_select_resolution",
  SELECT_LORAS: "img_select_loras",
  BTN_EDIT_PROMPT: "img_btn_edit_prompt",
  BTN_LORA_STRENGTH: "img_btn_lora_strength",
  BTN_TOGGLE_UPSCALE: "img_btn_toggle_upscale",
  BTN_GENERATE: "img_btn_generate",
  MODAL_PROMPT: "img_modal_prompt",
  MODAL_FIELD_PROMPT: "img_field_prompt",
  MODAL_FIELD_CREATIVITY: "img_field_creativity",
  MODAL_FIELD_SEED: "img_field_seed",
  MODAL_LORA_STRENGTH: "img_modal_lora_strength",
  MODAL_FIELD_STRENGTH_PREFIX: "img_field_strength_", // full: "img_field_strength_0" … "_3"
  // Output and status buttons; full customId: `${prefix}:${jobId}`
  CANCEL_PREFIX: "img_cancel",
  REROLL_PREFIX: "img_reroll",
  UPSCALE_PREFIX: "img_upscale",
  DELETE_PREFIX: "img_delete",
} as const;

// ---------------------------------------------------------------------------
// Draft state (per-user in-process map)
// ---------------------------------------------------------------------------

const _drafts = new Map<string, DraftParams>();

export function initDraft(userId: string, catalog: Catalog): DraftParams {
  const draft: DraftParams = {
    prompt: "",
    creativity: "",
    seed: "",
    resolution: catalog.defaultResolution.key,
    loras: [],
    upscale: false,
  };
  _drafts.set(userId, draft);
  return draft;
}

export function getDraft(userId: string): DraftParams | undefined {
  return _drafts.get(userId);
}

export function mergeDraft(userId: string, partial: Partial<DraftParams>): DraftParams {
  const existing = _drafts.get(userId);
  if (!existing) throw new Error(`No draft found for user ${userId}`);
  const updated = { ...existing, ...partial };
  _drafts.set(userId, updated);
  return updated;
}

export function deleteDraft(userId: string): void {
  _drafts.delete(userId);
}

// ---------------------------------------------------------------------------
// Embed builder
// ---------------------------------------------------------------------------

function loraSummary(draft: DraftParams, catalog: Catalog): string {
  if (draft.loras.length === 0) return "_none_";
  return draft.loras
    .map((pick) => {
      const name = catalog.loras.find((l) => l.file === pick.file)?.name ?? pick.file;
      return `${name} (${pick.strength.toFixed(2)})`;
    })
    .join("\n");
}

export function buildFormEmbed(draft: DraftParams, catalog: Catalog): EmbedBuilder {
  const resolution = catalog.resolutions.find((r) => r.key === draft.resolution);
  return new EmbedBuilder()
    .setTitle("Image Generation")
    .setColor(0x5865f2)
    .setDescription("Pick a resolution and LoRAs, then click **Generate**.")
    .addFields(
      {
        name: "Resolution",
        value: resolution ? `${resolution.label} (${resolution.width}×${resolution.height})` : draft.resolution,
        inline: true,
      },
      { name: "Seed", value: draft.seed.trim() || "random", inline: true },
      { name: "Creativity", value: draft.creativity.trim() || "off", inline: true },
      { name: "Upscale", value: draft.upscale ? "on" : "off", inline: true },
      { name: "LoRAs", value: loraSummary(draft, catalog) },
      {
        name: "Prompt",
        value: draft.prompt.length > 0 ? `\`\`\`${draft.prompt.slice(0, 1000)}\`\`\`` : "_not set_",
      },
    );
}

// ---------------------------------------------------------------------------
// Component row builders
// ---------------------------------------------------------------------------

function resolutionRow(draft: DraftParams, catalog: Catalog): ActionRowBuilder<StringSelectMenuBuilder> {
  const menu = new StringSelectMenuBuilder()
    .setCustomId(CUSTOM_ID.SELECT_RESOLUTION)
    .setPlaceholder("Select resolution…")
    .addOptions(
      catalog.resolutions.map((r) => ({
        label: `${r.label} (${r.width}×${r.height})`.slice(0, 100),
        value: r.key,
        default: r.key === draft.resolution,
      })),
    );
  return new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(menu);
}

function loraRow(draft: DraftParams, catalog: Catalog): ActionRowBuilder<StringSelectMenuBuilder> {
  const selected = new Set(draft.loras.map((l) => l.file));
  const menu = new StringSelectMenuBuilder()
    .setCustomId(CUSTOM_ID.SELECT_LORAS)
    .setPlaceholder(`LoRAs (up to ${MAX_LORAS})…`)
    .setMinValues(0)
    .setMaxValues(Math.min(MAX_LORAS, catalog.loras.length))
    .addOptions(
      catalog.loras.map((l) => ({
        label: l.name.slice(0, 100),
        value: l.file,
        description: `default strength ${l.defaultStrength.toFixed(2)}`,
        default: selected.has(l.file),
      })),
    );
  return new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(menu);
}

function buttonRow(draft: DraftParams, upscaleEnabled: boolean): ActionRowBuilder<ButtonBuilder> {
  const buttons = [
    new ButtonBuilder()
      .setCustomId(CUSTOM_ID.BTN_EDIT_PROMPT)
      .setLabel("Edit Prompt")
      .setStyle(ButtonStyle.Secondary),
    new ButtonBuilder()
      .setCustomId(CUSTOM_ID.BTN_LORA_STRENGTH)
      .setLabel("LoRA Strengths")
      .setStyle(ButtonStyle.Secondary)
      .setDisabled(draft.loras.length === 0),
  ];
  if (upscaleEnabled) {
    buttons.push(
      new ButtonBuilder()
        .setCustomId(CUSTOM_ID.BTN_TOGGLE_UPSCALE)
        .setLabel(`Upscale: ${draft.upscale ? "on" : "off"}`)
        .setStyle(draft.upscale ? ButtonStyle.Success : ButtonStyle.Secondary),
    );
  }
  buttons.push(
    new ButtonBuilder()
      .setCustomId(CUSTOM_ID.BTN_GENERATE)
      .setLabel("Generate")
      .setStyle(ButtonStyle.Primary)
      .setDisabled(draft.prompt.trim().length === 0),
  );
  return new ActionRowBuilder<ButtonBuilder>().addComponents(...buttons);
}

/** Embed plus every component row of the draft form. */
export function buildFormPayload(draft: DraftParams, catalog: Catalog, upscaleEnabled: boolean) {
  const rows: Array<ActionRowBuilder<StringSelectMenuBuilder> | ActionRowBuilder<ButtonBuilder>> = [
    resolutionRow(draft, catalog),
  ];
  if (catalog.loras.length > 0) rows.push(loraRow(draft, catalog));
  rows.push(buttonRow(draft, upscaleEnabled));
  return { embeds: [buildFormEmbed(draft, catalog)], components: rows };
}
