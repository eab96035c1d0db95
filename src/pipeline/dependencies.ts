import type { ExecutorDependencies } from './executor.js';
import type { PipelineConfig } from '../types.js';
import { GitSourceControl } from '../scm/git.js';
import { CogVersionTool } from '../version/cog-tool.js';
import { DockerTool } from '../container/docker-tool.js';
import { HttpReleaseTracker } from '../tracker/client.js';
import { SlackChatClient } from '../notifications/slack.js';
import { GitHubStatusPublisher } from '../output/publisher.js';
import { readAppCredentials } from '../github/client.js';
import { runCommand } from '../process/command-runner.js';
import type { RunHistory } from '../runs/types.js';

/** Wires the real CLI and HTTP collaborators from configuration. */
export function createDefaultDependencies(
  config: PipelineConfig,
  history: RunHistory | null,
  env: NodeJS.ProcessEnv = process.env
): ExecutorDependencies {
  const credentials = readAppCredentials(env);

  return {
    sourceControl: new GitSourceControl(config.workDir),
    versionTool: new CogVersionTool(config.workDir),
    container: new DockerTool(config.imageName, config.workDir),
    tracker: config.tracker ? new HttpReleaseTracker(config.tracker) : null,
    chat: config.slack ? new SlackChatClient(config.slack.token) : null,
    runCommand,
    statusPublisher: credentials ? GitHubStatusPublisher.fromCredentials(credentials) : null,
    history,
  };
}
