import {
  ActionRowBuilder,
  AttachmentBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
} from "discord.js";
import type { GenerationRecord } from "../../db/history.js";
import type { JobSnapshot } from "../../queue/types.js";
import { CUSTOM_ID } from "./formEmbed.js";

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 1) + "…" : text;
}

// ---------------------------------------------------------------------------
// Status lines (ephemeral reply / channel fallback)
// ---------------------------------------------------------------------------

export function queuedMessage(position: number): string {
  if (position <= 1) return "⏳ Queued — you're next! I'll update this message as your job runs.";
  return `⏳ Queued — position **${position}** in the queue. I'll update this message as your job runs.`;
}

export function statusLine(job: JobSnapshot): string {
  switch (job.status) {
    case "queued":
      return "⏳ Queued — waiting for a free slot.";
    case "submitted":
      return "📨 Sent to ComfyUI — waiting for it to start…";
    case "running": {
      const pct = Math.round(job.progress * 100);
      return job.progressMessage ? `🔄 Generating… ${pct}% (${job.progressMessage})` : `🔄 Generating… ${pct}%`;
    }
    case "succeeded":
      return "✅ Done — your image has been posted below.";
    case "failed":
      return "❌ Generation failed — see the error posted in the channel.";
    case "cancelled":
      return "🚫 Cancelled.";
  }
}

export function buildCancelRow(jobId: string): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(`${CUSTOM_ID.CANCEL_PREFIX}:${jobId}`)
      .setLabel("Cancel")
      .setStyle(ButtonStyle.Danger),
  );
}

// ---------------------------------------------------------------------------
// Result posts
// ---------------------------------------------------------------------------

export function buildResultMessage(job: JobSnapshot, displayName: string, upscaleEnabled: boolean) {
  const r = job.request;
  const files = (job.result ?? []).map((img) => new AttachmentBuilder(img.data, { name: img.filename }));

  const embed = new EmbedBuilder()
    .setTitle(`Image generated by ${displayName}`)
    .setColor(0x5865f2)
    .addFields(
      { name: "Resolution", value: `${r.resolution.width}×${r.resolution.height}`, inline: true },
      { name: "Seed", value: String(r.seed), inline: true },
      { name: "Upscaled", value: r.upscale ? "yes" : "no", inline: true },
      { name: "Prompt", value: truncate(r.prompt, 1000) },
    )
    .setFooter({ text: `Job ID: ${job.id}` });

  if (r.prompt !== r.originalPrompt) {
    embed.addFields({ name: "Original prompt", value: truncate(r.originalPrompt, 500) });
  }
  if (r.loras.length > 0) {
    embed.addFields({ name: "LoRAs", value: r.loras.map((l) => `${l.name} (${l.strength.toFixed(2)})`).join(", ") });
  }
  if (files.length > 0) {
    embed.setImage(`attachment://${files[0].name ?? "image.png"}`);
  }

  const buttons = [
    new ButtonBuilder()
      .setCustomId(`${CUSTOM_ID.REROLL_PREFIX}:${job.id}`)
      .setLabel("🎲 Re-roll")
      .setStyle(ButtonStyle.Primary),
  ];
  if (upscaleEnabled && !r.upscale) {
    buttons.push(
      new ButtonBuilder()
        .setCustomId(`${CUSTOM_ID.UPSCALE_PREFIX}:${job.id}`)
        .setLabel("⬆️ Upscale")
        .setStyle(ButtonStyle.Success),
    );
  }
  buttons.push(
    new ButtonBuilder()
      .setCustomId(`${CUSTOM_ID.DELETE_PREFIX}:${job.id}`)
      .setLabel("🗑️ Delete")
      .setStyle(ButtonStyle.Danger),
  );

  return {
    content: `<@${r.requesterId}>`,
    embeds: [embed],
    files,
    components: [new ActionRowBuilder<ButtonBuilder>().addComponents(...buttons)],
  };
}

export function buildFailureEmbed(job: JobSnapshot): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("Generation failed")
    .setColor(0xed4245)
    .setDescription(job.error?.userMessage ?? "An unexpected error occurred.")
    .setFooter({ text: `Job ID: ${job.id}` });
}

// ---------------------------------------------------------------------------
// History
// ---------------------------------------------------------------------------

const STATUS_ICON: Record<GenerationRecord["status"], string> = {
  succeeded: "✅",
  failed: "❌",
  cancelled: "🚫",
};

export function buildHistoryEmbed(records: GenerationRecord[]): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle("Your recent generations").setColor(0x5865f2);
  if (records.length === 0) return embed.setDescription("No generations yet. Try `/imagine`.");

  return embed.setDescription(
    records
      .map((rec) => {
        const when = `<t:${Math.floor(rec.createdAt / 1000)}:R>`;
        const r = rec.request;
        return `${STATUS_ICON[rec.status]} ${when} · ${r.resolution.key} · seed ${r.seed}\n> ${truncate(r.originalPrompt, 150)}`;
      })
      .join("\n\n"),
  );
}
