import { ConfigError, parseEnv } from './env.js';
import type { PipelineConfig, RegistryTarget, SlackSettings, TrackerSettings } from '../types.js';
import { logger } from '../observability/logger.js';

export { ConfigError } from './env.js';

/**
 * True when every environment has the same regions and both environments
 * are present, e.g. sandbox and production in eu and us.
 */
export function isFullRegistryGrid(registries: RegistryTarget[]): boolean {
  const regionsOf = (environment: RegistryTarget['environment']) =>
    registries
      .filter((target) => target.environment === environment)
      .map((target) => target.region)
      .sort()
      .join(',');

  const sandbox = regionsOf('sandbox');
  return sandbox.length > 0 && sandbox === regionsOf('production');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = parseEnv(env);

  let tracker: TrackerSettings | null = null;
  if (parsed.TRACKER_URL) {
    if (!parsed.TRACKER_API_KEY) {
      throw new ConfigError('TRACKER_API_KEY is required when TRACKER_URL is set', ['TRACKER_API_KEY: Required']);
    }
    tracker = {
      url: parsed.TRACKER_URL,
      apiKey: parsed.TRACKER_API_KEY,
      services: parsed.TRACKER_SERVICES ?? [parsed.SERVICE_NAME],
      releaseManager: parsed.TRACKER_RELEASE_MANAGER,
      priority: parsed.TRACKER_PRIORITY,
      cluster: parsed.TRACKER_CLUSTER,
      configApproval: parsed.TRACKER_CONFIG_APPROVAL,
      productionApproval: parsed.TRACKER_PRODUCTION_APPROVAL,
      rolloutStrategy: parsed.TRACKER_ROLLOUT_STRATEGY,
      productId: parsed.TRACKER_PRODUCT_ID,
      mode: parsed.TRACKER_MODE,
      environment: parsed.TRACKER_ENV,
    };
  }

  if (!isFullRegistryGrid(parsed.REGISTRIES)) {
    logger.warn('config', 'REGISTRIES does not cover every region in both sandbox and production', {
      registries: parsed.REGISTRIES.map((target) => `${target.environment}/${target.region}`),
    });
  }

  let slack: SlackSettings | null = null;
  if (parsed.SLACK_TOKEN && parsed.SLACK_CHANNEL) {
    slack = { token: parsed.SLACK_TOKEN, channel: parsed.SLACK_CHANNEL };
  }

  return {
    serviceName: parsed.SERVICE_NAME,
    targetBranch: parsed.TARGET_BRANCH,
    imageName: parsed.IMAGE_NAME,
    registries: parsed.REGISTRIES,
    pushParallel: parsed.PUSH_PARALLEL,
    timeoutMs: Math.round(parsed.PIPELINE_TIMEOUT_MINUTES * 60_000),
    workDir: parsed.WORK_DIR ?? process.cwd(),
    testCommands: parsed.TEST_COMMANDS,
    skipMarker: parsed.SKIP_CI_MARKER,
    tracker,
    slack,
  };
}
