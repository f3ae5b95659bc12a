import { logger } from "../logger.js";
import { isTerminal, type JobEvent, type JobSnapshot } from "../queue/types.js";
import { statusLine } from "./components/resultEmbed.js";

/** Interaction tokens live 15 minutes; stop using them a minute early. */
export const TOKEN_LIFETIME_MS = 14 * 60 * 1000;

/** Where progress for one job is shown. */
export interface ProgressSink {
  /** Edit the reply of the interaction that started the job. */
  editReply(content: string, job: JobSnapshot): Promise<void>;
  /** Post, or edit, a status message in the job's channel. */
  sendChannelStatus(content: string, job: JobSnapshot): Promise<void>;
  deliverResult(job: JobSnapshot): Promise<void>;
  deliverFailure(job: JobSnapshot): Promise<void>;
}

export interface RenderOptions {
  /** When the interaction token was issued (Unix ms). */
  tokenIssuedAt: number;
  now?: () => number;
  tokenLifetimeMs?: number;
  /** Text kept above every status line, e.g. an enhancement notice. */
  prefix?: string;
}

/**
 * Consume a job's event stream and mirror it into Discord: the reply is
 * edited on each status change and each 10% of progress. Once the token is
 * too old, or an edit fails, updates go to a channel message instead for the
 * rest of the job. Returns the terminal snapshot, or null if the stream ended
 * without one.
 */
export async function renderJobProgress(
  events: AsyncIterable<JobEvent>,
  sink: ProgressSink,
  options: RenderOptions,
): Promise<JobSnapshot | null> {
  const now = options.now ?? Date.now;
  const lifetime = options.tokenLifetimeMs ?? TOKEN_LIFETIME_MS;
  const prefix = options.prefix ?? "";
  let useChannel = false;
  let lastStatus: JobSnapshot["status"] | null = null;
  let lastMilestone = -1;

  const show = async (job: JobSnapshot): Promise<void> => {
    const content = prefix + statusLine(job);
    if (!useChannel && now() - options.tokenIssuedAt >= lifetime) {
      logger.debug({ jobId: job.id }, "Interaction token expired, switching to channel updates");
      useChannel = true;
    }
    if (!useChannel) {
      try {
        await sink.editReply(content, job);
        return;
      } catch (err) {
        logger.warn({ jobId: job.id, err }, "Could not edit interaction reply, switching to channel updates");
        useChannel = true;
      }
    }
    try {
      await sink.sendChannelStatus(content, job);
    } catch (err) {
      logger.warn({ jobId: job.id, err }, "Could not post channel status");
    }
  };

  for await (const event of events) {
    const job = event.job;

    if (isTerminal(job.status)) {
      await show(job);
      try {
        if (job.status === "succeeded") await sink.deliverResult(job);
        else if (job.status === "failed") await sink.deliverFailure(job);
      } catch (err) {
        logger.error({ jobId: job.id, err }, "Failed to deliver job outcome to Discord");
      }
      return job;
    }

    if (job.status !== lastStatus) {
      lastStatus = job.status;
      lastMilestone = Math.floor(job.progress * 10);
      await show(job);
      continue;
    }

    const milestone = Math.floor(job.progress * 10);
    if (event.type === "progress" && milestone > lastMilestone) {
      lastMilestone = milestone;
      await show(job);
    }
  }
  return null;
}
