import type { ChatClient, FlushResult } from './types.js';
import { formatFailureNotice, formatSuccessNotice } from './formatter.js';
import { type PipelineRun, versionChanged } from '../pipeline/run.js';
import { NotificationDeliveryError } from '../pipeline/errors.js';
import { logger, errorMessage } from '../observability/logger.js';
import { metrics } from '../metrics/metrics.js';

export interface AggregatorOptions {
  chat: ChatClient | null;
  channel: string;
  serviceName: string;
  targetBranch: string;
}

export class NotificationAggregator {
  private readonly events: string[] = [];
  private flushed = false;

  constructor(private readonly options: AggregatorOptions) {}

  record(event: string): void {
    if (this.flushed) {
      logger.warn('notification_record', 'Event recorded after flush, dropping', { event });
      return;
    }
    this.events.push(event);
  }

  getEvents(): string[] {
    return [...this.events];
  }

  /** Never rejects: delivery problems are logged and reported in the result. */
  async flush(run: PipelineRun): Promise<FlushResult> {
    if (this.flushed) {
      return { status: 'skipped', reason: 'already flushed' };
    }
    this.flushed = true;

    const notice = this.selectNotice(run);
    if (!notice) {
      logger.info('notification_flush', 'No notification for this run', {
        status: run.status,
        branch: run.branchName,
        versionChanged: versionChanged(run),
      });
      return { status: 'skipped', reason: 'no notification rule matched' };
    }

    const { chat, channel } = this.options;
    if (!chat) {
      logger.warn('notification_flush', 'Chat client not configured, notification dropped', {
        kind: notice.kind,
      });
      return { status: 'skipped', reason: 'chat not configured' };
    }

    try {
      const threadId = await chat.send(channel, notice.color, notice.text);
      for (const item of notice.replies) {
        await chat.send(channel, notice.color, item, threadId);
      }

      metrics.recordNotificationSent();
      logger.info('notification_flush', 'Notification sent', {
        kind: notice.kind,
        threadId,
        replies: notice.replies.length,
      });
      return { status: 'sent', threadId, replies: notice.replies.length };
    } catch (error) {
      const deliveryError = error instanceof NotificationDeliveryError
        ? error
        : new NotificationDeliveryError(channel, errorMessage(error));

      metrics.recordNotificationFailed();
      logger.error('notification_delivery', 'Notification delivery failed, run status unaffected', {
        kind: notice.kind,
        channel: deliveryError.channel,
        error: deliveryError.message,
      });
      return { status: 'failed', error: deliveryError.message };
    }
  }

  private selectNotice(run: PipelineRun) {
    const { serviceName, targetBranch } = this.options;
    if (run.branchName !== targetBranch) return null;

    if (run.status === 'Failed') {
      return {
        kind: 'failure',
        color: 'danger',
        text: formatFailureNotice(serviceName, run),
        replies: [],
      } as const;
    }

    if (run.status === 'Succeeded' && versionChanged(run)) {
      return {
        kind: 'success',
        color: 'good',
        text: formatSuccessNotice(serviceName, run),
        replies: [...this.events],
      } as const;
    }

    return null;
  }
}
