import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SlackChatClient } from '../slack.js';
import { NotificationDeliveryError } from '../../pipeline/errors.js';

interface RecordedRequest {
  url: string;
  authorization: string | null;
  body: unknown;
}

function fakeFetch(status: number, payload: unknown) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({
      url: String(input),
      authorization: new Headers(init?.headers).get('authorization'),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : null,
    });
    return new Response(JSON.stringify(payload), { status });
  };
  return { fetchImpl, requests };
}

describe('SlackChatClient', () => {
  it('posts a coloured attachment and returns the new thread id', async () => {
    const { fetchImpl, requests } = fakeFetch(200, { ok: true, ts: '1700000000.000100' });

    const threadId = await new SlackChatClient('test-token', fetchImpl).send('releases', 'good', 'example-service released 1.3.0');

    assert.equal(threadId, '1700000000.000100');
    assert.equal(requests[0].url, 'https://slack.com/api/chat.postMessage');
    assert.equal(requests[0].authorization, 'Bearer test-token');
    assert.deepEqual(requests[0].body, {
      channel: 'releases',
      attachments: [{ color: 'good', text: 'example-service released 1.3.0' }],
    });
  });

  it('replies in a thread and keeps the thread id', async () => {
    const { fetchImpl, requests } = fakeFetch(200, { ok: true, ts: '1700000000.000200' });

    const threadId = await new SlackChatClient('test-token', fetchImpl).send(
      'releases',
      'good',
      'COMMIT BUILT : abc123',
      '1700000000.000100'
    );

    assert.equal(threadId, '1700000000.000100');
    assert.deepEqual(requests[0].body, {
      channel: 'releases',
      attachments: [{ color: 'good', text: 'COMMIT BUILT : abc123' }],
      thread_ts: '1700000000.000100',
    });
  });

  it('rejects when slack refuses the message', async () => {
    const { fetchImpl } = fakeFetch(200, { ok: false, error: 'channel_not_found' });

    await assert.rejects(new SlackChatClient('test-token', fetchImpl).send('releases', 'danger', 'failed'), (error: unknown) => {
      assert.ok(error instanceof NotificationDeliveryError);
      assert.equal(error.message, 'Slack rejected message: channel_not_found');
      assert.equal(error.channel, 'releases');
      return true;
    });
  });

  it('rejects on an http error', async () => {
    const { fetchImpl } = fakeFetch(503, {});

    await assert.rejects(
      new SlackChatClient('test-token', fetchImpl).send('releases', 'danger', 'failed'),
      /Slack responded with HTTP 503/
    );
  });
});
