export type NoticeColor = 'good' | 'danger';

/**
 * Chat transport. Without `threadId` a new top-level message is posted and
 * its thread id returned; with it the text is posted as a reply.
 */
export interface ChatClient {
  send(channel: string, color: NoticeColor, text: string, threadId?: string): Promise<string>;
}

export type FlushResult =
  | { status: 'skipped'; reason: string }
  | { status: 'sent'; threadId: string; replies: number }
  | { status: 'failed'; error: string };
