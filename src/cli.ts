#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig, ConfigError } from './config/index.js';
import { PipelineExecutor } from './pipeline/executor.js';
import { createDefaultDependencies } from './pipeline/dependencies.js';
import { commitContextFromEnv } from './scm/context.js';
import { GitSourceControl } from './scm/git.js';
import { logger, errorMessage } from './observability/logger.js';

// Runs one pipeline for the commit described by the CI environment and
// exits 0 on success, 1 on a failed run, 2 on bad configuration.
async function main(): Promise<number> {
  dotenv.config();

  const config = loadConfig();
  const context = commitContextFromEnv(process.env);

  if (!context.branchName || !context.commitHash) {
    throw new ConfigError('Set BRANCH_NAME (or GITHUB_REF_NAME / GIT_BRANCH) and GIT_COMMIT (or GITHUB_SHA)');
  }

  const commitMessage =
    context.commitMessage ?? (await new GitSourceControl(config.workDir).readCommitMessage(context.commitHash));

  const executor = new PipelineExecutor(config, createDefaultDependencies(config, null));
  const report = await executor.execute({
    ...context,
    branchName: context.branchName,
    commitHash: context.commitHash,
    commitMessage,
  });

  return report.record.status === 'Succeeded' ? 0 : 1;
}

main().then(
  code => process.exit(code),
  error => {
    if (error instanceof ConfigError) {
      console.error(`FATAL: ${error.message}`);
      process.exit(2);
    }
    logger.error('cli_fatal', 'Pipeline could not run', { error: errorMessage(error) });
    process.exit(1);
  }
);
