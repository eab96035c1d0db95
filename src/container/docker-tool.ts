import type { ImageRef } from '../types.js';
import { type CommandRunner, runCommand } from '../process/command-runner.js';

export interface ContainerTool {
  build(version: string, commitHash: string, signal?: AbortSignal): Promise<ImageRef>;
  push(image: ImageRef, registryHost: string, signal?: AbortSignal): Promise<void>;
}

export function imageReference(image: ImageRef, registryHost?: string): string {
  const local = `${image.name}:${image.tag}`;
  return registryHost ? `${registryHost}/${local}` : local;
}

export class DockerTool implements ContainerTool {
  constructor(
    private readonly imageName: string,
    private readonly workDir: string,
    private readonly run: CommandRunner = runCommand,
    private readonly binary: string = 'docker'
  ) {}

  async build(version: string, commitHash: string, signal?: AbortSignal): Promise<ImageRef> {
    const image: ImageRef = { name: this.imageName, tag: version };
    await this.run(
      this.binary,
      ['build', '-t', imageReference(image), '--label', `org.opencontainers.image.revision=${commitHash}`, '.'],
      { cwd: this.workDir, signal }
    );
    return image;
  }

  async push(image: ImageRef, registryHost: string, signal?: AbortSignal): Promise<void> {
    const remote = imageReference(image, registryHost);
    await this.run(this.binary, ['tag', imageReference(image), remote], { cwd: this.workDir, signal });
    await this.run(this.binary, ['push', remote], { cwd: this.workDir, signal });
  }
}
