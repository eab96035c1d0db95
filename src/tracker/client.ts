import type { TrackerSettings } from '../types.js';
import { logger } from '../observability/logger.js';

const DEFAULT_HTTP_TIMEOUT_MS = 30_000;
const RESPONSE_TAIL_CHARS = 300;

export interface ReleaseInfo {
  version: string;
  dockerTag: string;
  description: string;
}

export interface TrackerPayload {
  service: string[];
  release_manager: string;
  new_version: string;
  docker_image: string;
  priority: number;
  cluster: string;
  config_approval: boolean;
  production_approval: boolean;
  rollout_strategy: Array<{
    rollout_percent: number;
    cooloff_minutes: number;
    pods: number;
  }>;
  description: string;
  product_id: string;
  mode: string;
  env: string;
}

export interface ReleaseTracker {
  registerRelease(release: ReleaseInfo, signal?: AbortSignal): Promise<void>;
}

export class TrackerRequestError extends Error {
  constructor(
    public readonly status: number,
    public readonly responseBody: string
  ) {
    super(`Rollout tracker responded with HTTP ${status}${responseBody ? `: ${responseBody}` : ''}`);
    this.name = 'TrackerRequestError';
  }
}

export function buildTrackerPayload(settings: TrackerSettings, release: ReleaseInfo): TrackerPayload {
  return {
    service: [...settings.services],
    release_manager: settings.releaseManager,
    new_version: release.version,
    docker_image: release.dockerTag,
    priority: settings.priority,
    cluster: settings.cluster,
    config_approval: settings.configApproval,
    production_approval: settings.productionApproval,
    rollout_strategy: settings.rolloutStrategy.map(step => ({
      rollout_percent: step.rolloutPercent,
      cooloff_minutes: step.cooloffMinutes,
      pods: step.pods,
    })),
    description: release.description,
    product_id: settings.productId,
    mode: settings.mode,
    env: settings.environment,
  };
}

export class HttpReleaseTracker implements ReleaseTracker {
  constructor(
    private readonly settings: TrackerSettings,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS
  ) {}

  async registerRelease(release: ReleaseInfo, signal?: AbortSignal): Promise<void> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const payload = buildTrackerPayload(this.settings, release);

    const response = await this.fetchImpl(this.settings.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.settings.apiKey,
      },
      body: JSON.stringify(payload),
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });

    if (!response.ok) {
      const body = (await response.text()).slice(0, RESPONSE_TAIL_CHARS);
      throw new TrackerRequestError(response.status, body);
    }

    logger.info('tracker_registration', 'Release registered with rollout tracker', {
      version: release.version,
      services: payload.service,
      status: response.status,
    });
  }
}
