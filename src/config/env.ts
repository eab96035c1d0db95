import { z } from 'zod';
import type { RegistryTarget, RolloutStep } from '../types.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const boolFlag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const commaList = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

// "sandbox/eu=registry.eu.example.com,production/us=registry.us.example.com"
const registryList = z.string().transform((value, ctx): RegistryTarget[] => {
  const targets: RegistryTarget[] = [];
  for (const entry of value.split(',').map((item) => item.trim()).filter(Boolean)) {
    const match = /^(sandbox|production)\/([\w-]+)=(\S+)$/.exec(entry);
    if (!match) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid registry entry "${entry}", expected <sandbox|production>/<region>=<host>`,
      });
      return z.NEVER;
    }
    const environment = match[1] === 'sandbox' ? 'sandbox' : 'production';
    const region = match[2];
    if (targets.some((target) => target.environment === environment && target.region === region)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate registry ${environment}/${region}`,
      });
      return z.NEVER;
    }
    targets.push({ environment, region, host: match[3] });
  }
  if (targets.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At least one registry is required' });
    return z.NEVER;
  }
  return targets;
});

// "5:10:1,50:15:2,100:0:4" → rollout percent : cool-off minutes : pods
const rolloutStrategy = z.string().transform((value, ctx): RolloutStep[] => {
  const steps: RolloutStep[] = [];
  for (const entry of value.split(',').map((item) => item.trim()).filter(Boolean)) {
    const parts = entry.split(':').map((part) => Number(part));
    if (parts.length !== 3 || parts.some((part) => !Number.isInteger(part) || part < 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid rollout step "${entry}", expected <percent>:<cooloffMinutes>:<pods>`,
      });
      return z.NEVER;
    }
    const [rolloutPercent, cooloffMinutes, pods] = parts;
    steps.push({ rolloutPercent, cooloffMinutes, pods });
  }
  return steps;
});

// "make check-fmt;make test" → [["make", "check-fmt"], ["make", "test"]]
const commandList = z.string().transform((value) =>
  value
    .split(';')
    .map((command) => command.trim().split(/\s+/).filter(Boolean))
    .filter((argv) => argv.length > 0)
);

export const envSchema = z.object({
  SERVICE_NAME: z.string().min(1).default('app'),
  TARGET_BRANCH: z.string().min(1).default('main'),
  IMAGE_NAME: z.string().min(1),
  REGISTRIES: registryList,
  PUSH_PARALLEL: boolFlag.default('false'),
  PIPELINE_TIMEOUT_MINUTES: z.coerce.number().positive().default(20),
  WORK_DIR: z.string().min(1).optional(),
  TEST_COMMANDS: commandList.default('make check-fmt;make test'),
  SKIP_CI_MARKER: z.string().min(1).default('[skip ci]'),

  TRACKER_URL: z.string().url().optional(),
  TRACKER_API_KEY: z.string().min(1).optional(),
  TRACKER_SERVICES: commaList.optional(),
  TRACKER_RELEASE_MANAGER: z.string().min(1).default('release-bot'),
  TRACKER_PRIORITY: z.coerce.number().int().min(0).default(0),
  TRACKER_CLUSTER: z.string().min(1).default('default'),
  TRACKER_CONFIG_APPROVAL: boolFlag.default('false'),
  TRACKER_PRODUCTION_APPROVAL: boolFlag.default('false'),
  TRACKER_ROLLOUT_STRATEGY: rolloutStrategy.default('5:10:1,50:10:1,100:0:1'),
  TRACKER_PRODUCT_ID: z.string().min(1).default('default'),
  TRACKER_MODE: z.string().min(1).default('AUTO'),
  TRACKER_ENV: z.string().min(1).default('PROD'),

  SLACK_TOKEN: z.string().min(1).optional(),
  SLACK_CHANNEL: z.string().min(1).optional(),
});

export type ParsedEnv = z.infer<typeof envSchema>;

/** Unset and empty variables both count as absent. */
export function compactEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const compacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      compacted[key] = value;
    }
  }
  return compacted;
}

export function parseEnv(env: NodeJS.ProcessEnv): ParsedEnv {
  const result = envSchema.safeParse(compactEnv(env));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`);
    throw new ConfigError(`Invalid pipeline configuration:\n  ${issues.join('\n  ')}`, issues);
  }
  return result.data;
}
