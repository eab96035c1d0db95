import { createAppAuth } from '@octokit/auth-app';
import { Octokit } from '@octokit/rest';

export interface GitHubAppCredentials {
  appId: string;
  privateKey: string;
}

export function readAppCredentials(env: NodeJS.ProcessEnv = process.env): GitHubAppCredentials | null {
  const appId = env.GITHUB_APP_ID;
  const privateKey = env.GITHUB_PRIVATE_KEY;
  if (!appId || !privateKey) return null;
  return { appId, privateKey: privateKey.replace(/\\n/g, '\n') };
}

export async function createInstallationClient(
  credentials: GitHubAppCredentials,
  installationId: number
): Promise<Octokit> {
  const auth = createAppAuth({
    appId: credentials.appId,
    privateKey: credentials.privateKey,
  });

  const installationAuth = await auth({
    type: 'installation',
    installationId,
  });

  return new Octokit({
    auth: installationAuth.token,
  });
}
