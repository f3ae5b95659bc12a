import { SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { initDraft } from "../components/formEmbed.js";
import { buildPromptModal } from "../components/promptModal.js";
import type { BotContext } from "../context.js";

export const data = new SlashCommandBuilder()
  .setName("imagine")
  .setDescription("Generate an image with ComfyUI");

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void> {
  // Fresh draft with defaults, then straight into the prompt modal.
  // The form (resolution, LoRAs, Generate) appears after the modal is submitted.
  const draft = initDraft(interaction.user.id, ctx.catalog);
  await interaction.showModal(buildPromptModal(draft, ctx.enhancer !== null));
}
