import type { ChatClient, NoticeColor } from './types.js';
import { NotificationDeliveryError } from '../pipeline/errors.js';

const SLACK_POST_MESSAGE_URL = 'https://slack.com/api/chat.postMessage';
const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

interface SlackPostMessageResponse {
  ok: boolean;
  ts?: string;
  error?: string;
}

function isPostMessageResponse(value: unknown): value is SlackPostMessageResponse {
  return typeof value === 'object' && value !== null && 'ok' in value && typeof value.ok === 'boolean';
}

export class SlackChatClient implements ChatClient {
  constructor(
    private readonly token: string,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS
  ) {}

  async send(channel: string, color: NoticeColor, text: string, threadId?: string): Promise<string> {
    const body: Record<string, unknown> = {
      channel,
      attachments: [{ color, text }],
    };
    if (threadId) body.thread_ts = threadId;

    const response = await this.fetchImpl(SLACK_POST_MESSAGE_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json; charset=utf-8',
        Authorization: `Bearer ${this.token}`,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new NotificationDeliveryError(channel, `Slack responded with HTTP ${response.status}`);
    }

    const payload: unknown = await response.json();
    if (!isPostMessageResponse(payload) || !payload.ok || !payload.ts) {
      const reason = isPostMessageResponse(payload) ? payload.error ?? 'missing ts' : 'malformed response';
      throw new NotificationDeliveryError(channel, `Slack rejected message: ${reason}`);
    }

    return threadId ?? payload.ts;
  }
}
