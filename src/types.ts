export interface CommitContext {
  branchName: string;
  commitHash: string;
  commitMessage: string;
  owner?: string;
  repo?: string;
  installationId?: number;
}

export interface ImageRef {
  name: string;
  tag: string;
}

export interface RegistryTarget {
  environment: 'sandbox' | 'production';
  region: string;
  host: string;
}

export interface RolloutStep {
  rolloutPercent: number;
  cooloffMinutes: number;
  pods: number;
}

export interface TrackerSettings {
  url: string;
  apiKey: string;
  services: string[];
  releaseManager: string;
  priority: number;
  cluster: string;
  configApproval: boolean;
  productionApproval: boolean;
  rolloutStrategy: RolloutStep[];
  productId: string;
  mode: string;
  environment: string;
}

export interface SlackSettings {
  token: string;
  channel: string;
}

export interface PipelineConfig {
  serviceName: string;
  targetBranch: string;
  imageName: string;
  registries: RegistryTarget[];
  pushParallel: boolean;
  timeoutMs: number;
  workDir: string;
  testCommands: string[][];
  skipMarker: string;
  tracker: TrackerSettings | null;
  slack: SlackSettings | null;
}
