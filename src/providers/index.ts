import type { LaunchConfig } from '../config/config.js';
import type { RemoteBackend } from './types.js';
import { GitHubApiBackend } from './github-api.js';
import { GhCliBackend } from './gh-cli.js';

export function createBackend(config: LaunchConfig): RemoteBackend {
  switch (config.backend) {
    case 'api':
      return new GitHubApiBackend({ github: config.github, token: config.token });
    case 'gh':
      return new GhCliBackend({ github: config.github, cwd: config.workspaceRoot });
  }
}

export type { RemoteBackend, CredentialIdentity } from './types.js';
