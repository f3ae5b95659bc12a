import type { Client, Message, MessageComponentInteraction, SendableChannels } from "discord.js";
import type { JobSnapshot } from "../queue/types.js";
import { isTerminal } from "../queue/types.js";
import { buildCancelRow, buildFailureEmbed, buildResultMessage } from "./components/resultEmbed.js";
import type { ProgressSink } from "./progressRenderer.js";

/**
 * ProgressSink backed by a component interaction's reply, with the job's
 * channel for the fallback status message and the final post.
 */
export class DiscordProgressSink implements ProgressSink {
  private statusMessage: Message | null = null;

  constructor(
    private readonly client: Client,
    private readonly interaction: MessageComponentInteraction,
    private readonly upscaleEnabled: boolean,
  ) {}

  async editReply(content: string, job: JobSnapshot): Promise<void> {
    await this.interaction.editReply({
      content,
      embeds: [],
      components: isTerminal(job.status) ? [] : [buildCancelRow(job.id)],
    });
  }

  async sendChannelStatus(content: string, job: JobSnapshot): Promise<void> {
    if (this.statusMessage) {
      await this.statusMessage.edit({ content: `<@${job.request.requesterId}> ${content}` });
      return;
    }
    const channel = await this.channel(job.request.channelId);
    this.statusMessage = await channel.send({
      content: `<@${job.request.requesterId}> ${content}`,
      allowedMentions: { users: [] },
    });
  }

  async deliverResult(job: JobSnapshot): Promise<void> {
    const channel = await this.channel(job.request.channelId);
    const user = await this.client.users.fetch(job.request.requesterId).catch(() => null);
    await channel.send(buildResultMessage(job, user?.displayName ?? "Unknown User", this.upscaleEnabled));
  }

  async deliverFailure(job: JobSnapshot): Promise<void> {
    const channel = await this.channel(job.request.channelId);
    await channel.send({ content: `<@${job.request.requesterId}>`, embeds: [buildFailureEmbed(job)] });
  }

  private async channel(channelId: string): Promise<SendableChannels> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel?.isSendable()) throw new Error(`Channel ${channelId} is not a text channel`);
    return channel;
  }
}
