import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigError, isFullRegistryGrid, loadConfig } from '../index.js';
import { captureLogs, silenceLogs } from '../../__tests__/helpers/fakes.js';

const BASE_ENV = {
  IMAGE_NAME: 'example-service',
  REGISTRIES: [
    'sandbox/eu=sandbox-eu.registry.test',
    'sandbox/us=sandbox-us.registry.test',
    'production/eu=production-eu.registry.test',
    'production/us=production-us.registry.test',
  ].join(', '),
  WORK_DIR: '/srv/checkout',
};

describe('loadConfig', () => {
  afterEach(() => silenceLogs());

  it('applies defaults to a minimal environment', () => {
    const config = loadConfig(BASE_ENV);

    assert.equal(config.serviceName, 'app');
    assert.equal(config.targetBranch, 'main');
    assert.equal(config.pushParallel, false);
    assert.equal(config.timeoutMs, 20 * 60_000);
    assert.equal(config.skipMarker, '[skip ci]');
    assert.deepEqual(config.testCommands, [
      ['make', 'check-fmt'],
      ['make', 'test'],
    ]);
    assert.deepEqual(config.registries, [
      { environment: 'sandbox', region: 'eu', host: 'sandbox-eu.registry.test' },
      { environment: 'sandbox', region: 'us', host: 'sandbox-us.registry.test' },
      { environment: 'production', region: 'eu', host: 'production-eu.registry.test' },
      { environment: 'production', region: 'us', host: 'production-us.registry.test' },
    ]);
    assert.equal(config.tracker, null);
    assert.equal(config.slack, null);
  });

  it('treats empty variables as unset', () => {
    const config = loadConfig({ ...BASE_ENV, TARGET_BRANCH: '', SLACK_TOKEN: '' });
    assert.equal(config.targetBranch, 'main');
    assert.equal(config.slack, null);
  });

  it('parses flags, budgets and commands', () => {
    const config = loadConfig({
      ...BASE_ENV,
      PUSH_PARALLEL: 'YES',
      PIPELINE_TIMEOUT_MINUTES: '1.5',
      TEST_COMMANDS: 'npm run lint ; npm test',
    });

    assert.equal(config.pushParallel, true);
    assert.equal(config.timeoutMs, 90_000);
    assert.deepEqual(config.testCommands, [
      ['npm', 'run', 'lint'],
      ['npm', 'test'],
    ]);
  });

  it('enables slack only when token and channel are both set', () => {
    assert.equal(loadConfig({ ...BASE_ENV, SLACK_TOKEN: 'test-token' }).slack, null);
    assert.deepEqual(loadConfig({ ...BASE_ENV, SLACK_TOKEN: 'test-token', SLACK_CHANNEL: 'releases' }).slack, {
      token: 'test-token',
      channel: 'releases',
    });
  });

  it('builds tracker settings with the service name as default service', () => {
    const config = loadConfig({
      ...BASE_ENV,
      SERVICE_NAME: 'example-service',
      TRACKER_URL: 'https://tracker.example.test/releases',
      TRACKER_API_KEY: 'test-api-key',
      TRACKER_ROLLOUT_STRATEGY: '10:15:1,100:0:4',
      TRACKER_PRODUCTION_APPROVAL: 'true',
    });

    assert.deepEqual(config.tracker, {
      url: 'https://tracker.example.test/releases',
      apiKey: 'test-api-key',
      services: ['example-service'],
      releaseManager: 'release-bot',
      priority: 0,
      cluster: 'default',
      configApproval: false,
      productionApproval: true,
      rolloutStrategy: [
        { rolloutPercent: 10, cooloffMinutes: 15, pods: 1 },
        { rolloutPercent: 100, cooloffMinutes: 0, pods: 4 },
      ],
      productId: 'default',
      mode: 'AUTO',
      environment: 'PROD',
    });
  });

  it('requires an api key once the tracker url is set', () => {
    assert.throws(
      () => loadConfig({ ...BASE_ENV, TRACKER_URL: 'https://tracker.example.test/releases' }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.equal(error.message, 'TRACKER_API_KEY is required when TRACKER_URL is set');
        return true;
      }
    );
  });

  it('reports every invalid variable', () => {
    assert.throws(
      () => loadConfig({ REGISTRIES: 'staging/eu=host.test', PIPELINE_TIMEOUT_MINUTES: '-5' }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.equal(error.issues.length, 3);
        assert.ok(error.message.startsWith('Invalid pipeline configuration:\n  '));
        assert.ok(
          error.issues.includes(
            'REGISTRIES: Invalid registry entry "staging/eu=host.test", expected <sandbox|production>/<region>=<host>'
          )
        );
        return true;
      }
    );
  });

  it('rejects the same environment and region listed twice', () => {
    assert.throws(
      () =>
        loadConfig({
          ...BASE_ENV,
          REGISTRIES: 'sandbox/eu=one.registry.test, sandbox/eu=two.registry.test',
        }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.deepEqual(error.issues, ['REGISTRIES: Duplicate registry sandbox/eu']);
        return true;
      }
    );
  });

  it('warns when the registries do not form a full environment and region grid', () => {
    const lines = captureLogs();

    const config = loadConfig({
      ...BASE_ENV,
      REGISTRIES: 'sandbox/eu=sandbox-eu.registry.test, production/us=production-us.registry.test',
    });

    assert.equal(config.registries.length, 2);
    const warnings = lines.filter((line) => line.level === 'warn');
    assert.equal(warnings.length, 1);
    assert.equal(warnings[0].phase, 'config');
    assert.deepEqual(warnings[0].data, { registries: ['sandbox/eu', 'production/us'] });
  });

  it('stays quiet for a complete registry grid', () => {
    const lines = captureLogs();
    loadConfig(BASE_ENV);
    assert.deepEqual(lines, []);
  });
});

describe('isFullRegistryGrid', () => {
  const target = (environment: 'sandbox' | 'production', region: string) => ({
    environment,
    region,
    host: `${environment}-${region}.registry.test`,
  });

  it('accepts matching regions in both environments', () => {
    assert.equal(isFullRegistryGrid([target('production', 'us'), target('sandbox', 'us')]), true);
  });

  it('rejects a missing environment or region', () => {
    assert.equal(isFullRegistryGrid([target('sandbox', 'eu'), target('sandbox', 'us')]), false);
    assert.equal(
      isFullRegistryGrid([target('sandbox', 'eu'), target('sandbox', 'us'), target('production', 'eu')]),
      false
    );
    assert.equal(isFullRegistryGrid([]), false);
  });
});
