import type { RemoteBackend, CredentialIdentity } from './types.js';
import type { GithubConfig } from '../config/config.js';
import { createLogger } from '../logger.js';
import { failure, success, type StageResult } from '../lib/result.js';
import { outputOf, runTool, succeeded, type RunResult } from '../lib/exec.js';
import { buildGithubOwnerRepo, pullNumberFromUrl, repoCloneUrl, repoWebUrl } from '../lib/github.js';
import type {
  CredentialContext,
  PullRequestRef,
  PullRequestSpec,
  RepositoryDescriptor,
} from '../types/launch.js';

const logger = createLogger();

export interface GhCliBackendOptions {
  github: GithubConfig;
  cwd: string;
}

/** Delegates authentication and transport to an already logged-in `gh`. */
export class GhCliBackend implements RemoteBackend {
  readonly kind = 'gh' as const;
  readonly requiredTools = ['gh', 'git'] as const;
  readonly credential: CredentialContext = { kind: 'interactive-session' };

  constructor(private readonly options: GhCliBackendOptions) {}

  checkCredentialPresent(): StageResult<void> {
    // The session lives in gh's own store; only `gh auth status` can tell.
    return success(undefined);
  }

  async validateCredential(): Promise<StageResult<CredentialIdentity>> {
    const res = this.gh(['auth', 'status', '--hostname', this.options.github.host]);
    if (!succeeded(res)) {
      return failure(
        'preconditions',
        'NotAuthenticated',
        `Not authenticated with GitHub CLI (${outputOf(res)}). Run: gh auth login`,
      );
    }
    const match = `${res.stdout}\n${res.stderr}`.match(/Logged in to \S+ (?:account|as) ([A-Za-z0-9-]+)/);
    return success(match ? { login: match[1] } : {});
  }

  async createRepository(repo: RepositoryDescriptor): Promise<StageResult<string>> {
    const target = this.target(repo);
    const probe = this.gh(['repo', 'view', target, '--json', 'url']);
    if (succeeded(probe)) {
      return failure('provision', 'AlreadyExists', `Repository ${buildGithubOwnerRepo(repo.owner, repo.name)} already exists`);
    }
    const res = this.gh([
      'repo',
      'create',
      target,
      repo.visibility === 'private' ? '--private' : '--public',
      '--description',
      repo.description,
      '--disable-wiki',
    ]);
    if (!succeeded(res)) {
      return failure('provision', 'RemoteError', `Error creating repository: ${outputOf(res)}`);
    }
    const printed = lastUrl(res.stdout);
    return success(printed ?? repoWebUrl(this.options.github.host, repo.owner, repo.name));
  }

  pushUrl(repo: RepositoryDescriptor): string {
    return repoCloneUrl(this.options.github.host, repo.owner, repo.name);
  }

  async openPullRequest(repo: RepositoryDescriptor, spec: PullRequestSpec): Promise<StageResult<PullRequestRef>> {
    const res = this.gh([
      'pr',
      'create',
      '--repo',
      this.target(repo),
      '--title',
      spec.title,
      '--body',
      spec.body,
      '--base',
      spec.base.name,
      '--head',
      spec.head.name,
    ]);
    if (!succeeded(res)) {
      return failure('pull-request', 'RemoteError', `Error creating pull request: ${outputOf(res)}`);
    }
    const url = lastUrl(res.stdout);
    const number = url ? pullNumberFromUrl(url) : undefined;
    if (!url || number === undefined) {
      return failure('pull-request', 'RemoteError', `gh pr create printed no pull request URL: ${res.stdout.trim()}`);
    }
    return success({ number, url });
  }

  private target(repo: RepositoryDescriptor): string {
    const ownerRepo = buildGithubOwnerRepo(repo.owner, repo.name);
    return this.options.github.host === 'github.com' ? ownerRepo : `${this.options.github.host}/${ownerRepo}`;
  }

  private gh(args: string[]): RunResult {
    logger.debug(`gh ${args[0]} ${args[1] ?? ''}`.trimEnd());
    return runTool('gh', args, { cwd: this.options.cwd });
  }
}

function lastUrl(output: string): string | undefined {
  const urls = output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => /^https?:\/\/\S+$/.test(line));
  return urls.length > 0 ? urls[urls.length - 1] : undefined;
}
