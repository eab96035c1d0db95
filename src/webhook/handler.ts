import crypto from 'crypto';
import type { CommitContext } from '../types.js';
import type { PipelineExecutor } from '../pipeline/executor.js';
import type { IdempotencyStore } from '../persistence/types.js';
import { logger, errorMessage, generateRunId } from '../observability/logger.js';
import { metrics } from '../metrics/metrics.js';

export interface WebhookDependencies {
  secret: string | undefined;
  executor: Pick<PipelineExecutor, 'execute'>;
  idempotency: IdempotencyStore;
}

/** The slice of an Express request/response the handler touches. */
export interface WebhookRequest {
  header(name: string): string | undefined;
  body: unknown;
}

export interface WebhookResponse {
  status(code: number): { json(body: unknown): unknown };
}

export function verifySignature(payload: string | Buffer, signature: string, secret: string): boolean {
  const digest = 'sha256=' + crypto.createHmac('sha256', secret).update(payload).digest('hex');
  const expected = Buffer.from(digest);
  const received = Buffer.from(signature);
  return expected.length === received.length && crypto.timingSafeEqual(expected, received);
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : {};
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** Reads the fields the pipeline needs from a GitHub `push` payload. */
export function parsePushEvent(body: unknown): CommitContext | null {
  const payload = asRecord(body);
  const ref = asString(payload.ref);
  const after = asString(payload.after);

  if (!ref?.startsWith('refs/heads/') || !after || /^0+$/.test(after)) {
    return null;
  }

  const headCommit = asRecord(payload.head_commit);
  const repository = asRecord(payload.repository);
  const installation = asRecord(payload.installation);

  return {
    branchName: ref.slice('refs/heads/'.length),
    commitHash: after,
    commitMessage: asString(headCommit.message) ?? '',
    owner: asString(asRecord(repository.owner).login),
    repo: asString(repository.name),
    installationId: typeof installation.id === 'number' ? installation.id : undefined,
  };
}

function extractIdempotencyKey(deliveryId: string | undefined, context: CommitContext): string {
  return `${deliveryId ?? 'unknown'}:${context.owner ?? 'unknown'}/${context.repo ?? 'unknown'}:${context.branchName}:${context.commitHash}`;
}

export function createWebhookHandler(deps: WebhookDependencies) {
  return async function webhookHandler(req: WebhookRequest, res: WebhookResponse): Promise<void> {
    const signature = req.header('x-hub-signature-256');
    const event = req.header('x-github-event');
    const deliveryId = req.header('x-github-delivery');

    if (!signature) {
      logger.warn('webhook_validation', 'Missing signature header');
      res.status(401).json({ error: 'Missing signature' });
      return;
    }

    if (!deps.secret) {
      logger.error('webhook_validation', 'GITHUB_WEBHOOK_SECRET not configured');
      res.status(500).json({ error: 'Server misconfiguration' });
      return;
    }

    const rawBody: unknown = req.body;
    if (!Buffer.isBuffer(rawBody) || !verifySignature(rawBody, signature, deps.secret)) {
      logger.warn('webhook_validation', 'Invalid signature');
      res.status(401).json({ error: 'Invalid signature' });
      return;
    }

    if (event !== 'push') {
      metrics.recordWebhookIgnored();
      logger.info('webhook_filtering', 'Non-push event ignored', { event });
      res.status(200).json({ message: 'Event ignored' });
      return;
    }

    let body: unknown;
    try {
      body = JSON.parse(rawBody.toString('utf-8'));
    } catch (error) {
      logger.warn('webhook_validation', 'Malformed JSON payload', { error: errorMessage(error) });
      res.status(400).json({ error: 'Malformed payload' });
      return;
    }

    const context = parsePushEvent(body);
    if (!context) {
      metrics.recordWebhookIgnored();
      logger.info('webhook_filtering', 'Push without a branch head ignored', { deliveryId });
      res.status(200).json({ message: 'Push ignored' });
      return;
    }

    const idempotencyKey = extractIdempotencyKey(deliveryId, context);
    const check = await deps.idempotency.checkAndMark(idempotencyKey);
    if (check.status === 'duplicate_recent') {
      metrics.recordDuplicateWebhook();
      logger.info('idempotency_guard', 'Duplicate delivery detected, skipping', {
        idempotencyKey,
        firstSeenAt: check.firstSeenAt.toISOString(),
      });
      res.status(200).json({ message: 'Duplicate delivery', idempotencyKey });
      return;
    }

    const runId = generateRunId();
    metrics.recordWebhookAccepted();
    logger.info('webhook_received', 'Push accepted, starting pipeline', {
      deliveryId,
      idempotencyKey,
      runId,
      branch: context.branchName,
    });

    res.status(202).json({ message: 'Pipeline started', runId, idempotencyKey });

    deps.executor.execute(context, runId).catch(error => {
      logger.error('pipeline_fatal', 'Unhandled pipeline error', {
        runId,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    });
  };
}
