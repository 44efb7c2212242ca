import fetch from 'node-fetch';
import type { RemoteBackend, CredentialIdentity } from './types.js';
import type { GithubConfig } from '../config/config.js';
import { createLogger } from '../logger.js';
import { describeError, failure, success, type StageResult } from '../lib/result.js';
import { buildGithubOwnerRepo, repoCloneUrl, repoWebUrl } from '../lib/github.js';
import type {
  CredentialContext,
  PullRequestRef,
  PullRequestSpec,
  RepositoryDescriptor,
} from '../types/launch.js';

const logger = createLogger();

export interface GitHubApiBackendOptions {
  github: GithubConfig;
  token?: string;
}

type JsonObject = Record<string, unknown>;

/**
 * REST-driven backend. Authenticates every call with a bearer token and
 * pushes through a remote URL that embeds the same token.
 */
export class GitHubApiBackend implements RemoteBackend {
  readonly kind = 'api' as const;
  readonly requiredTools = ['git'] as const;
  readonly credential: CredentialContext;

  constructor(private readonly options: GitHubApiBackendOptions) {
    this.credential = { kind: 'bearer-token', token: options.token ?? '' };
  }

  checkCredentialPresent(): StageResult<void> {
    if (!this.options.token) {
      return failure(
        'preconditions',
        'InvalidCredential',
        'GITHUB_TOKEN not set. Export a token with repo scope (https://github.com/settings/tokens).',
      );
    }
    return success(undefined);
  }

  async validateCredential(): Promise<StageResult<CredentialIdentity>> {
    const res = await this.request('GET', '/user');
    if (!res.ok) {
      return failure('preconditions', 'InvalidCredential', `Unable to verify GitHub token: ${res.error}`);
    }
    const login = res.data?.login;
    if (typeof login !== 'string' || login === '') {
      const detail = remoteMessage(res.data) ?? `HTTP ${res.status}`;
      return failure('preconditions', 'InvalidCredential', `Invalid GitHub token: ${detail}`);
    }
    return success({ login });
  }

  async createRepository(repo: RepositoryDescriptor): Promise<StageResult<string>> {
    const res = await this.request('POST', '/user/repos', {
      name: repo.name,
      description: repo.description,
      homepage: repoWebUrl(this.options.github.host, repo.owner, repo.name),
      private: repo.visibility === 'private',
      has_issues: true,
      has_projects: true,
      has_wiki: false,
      auto_init: false,
    });
    if (!res.ok) {
      return failure('provision', 'RemoteError', `Error creating repository: ${res.error}`);
    }
    // A message field is authoritative even on a 2xx status.
    const message = remoteMessage(res.data);
    if (message !== undefined) {
      return failure('provision', 'RemoteError', `Error creating repository: ${message}`);
    }
    const url = res.data?.html_url;
    if (typeof url !== 'string') {
      return failure('provision', 'RemoteError', `Repository response (HTTP ${res.status}) has no html_url`);
    }
    return success(url);
  }

  pushUrl(repo: RepositoryDescriptor): string {
    return repoCloneUrl(this.options.github.host, repo.owner, repo.name, this.options.token);
  }

  async openPullRequest(repo: RepositoryDescriptor, spec: PullRequestSpec): Promise<StageResult<PullRequestRef>> {
    const ownerRepo = buildGithubOwnerRepo(repo.owner, repo.name);
    const res = await this.request('POST', `/repos/${ownerRepo}/pulls`, {
      title: spec.title,
      body: spec.body,
      head: spec.head.name,
      base: spec.base.name,
    });
    if (!res.ok) {
      return failure('pull-request', 'RemoteError', `Error creating pull request: ${res.error}`);
    }
    const message = remoteMessage(res.data);
    if (message !== undefined) {
      return failure('pull-request', 'RemoteError', `Error creating pull request: ${message}`);
    }
    const url = res.data?.html_url;
    const number = res.data?.number;
    if (typeof url !== 'string' || typeof number !== 'number') {
      return failure('pull-request', 'RemoteError', `Pull request response (HTTP ${res.status}) has no html_url/number`);
    }
    return success({ number, url });
  }

  private async request(
    method: 'GET' | 'POST',
    route: string,
    payload?: JsonObject,
  ): Promise<{ ok: true; status: number; data: JsonObject | undefined } | { ok: false; error: string }> {
    const url = `${this.options.github.apiBase}${route}`;
    logger.debug(`${method} ${url}`);
    try {
      const response = await fetch(url, {
        method,
        headers: headers(this.options.token ?? ''),
        body: payload ? JSON.stringify(payload) : undefined,
      });
      const text = await response.text();
      logger.debug(`${method} ${url} -> ${response.status}`);
      return { ok: true, status: response.status, data: parseObject(text) };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }
}

function parseObject(text: string): JsonObject | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * GitHub error bodies carry `message`, with per-field detail under `errors[]`.
 * A null or false `message` counts as absent.
 */
export function remoteMessage(data: JsonObject | undefined): string | undefined {
  if (!data || data.message === undefined || data.message === null || data.message === false) return undefined;
  const base = String(data.message);
  const details = Array.isArray(data.errors)
    ? data.errors
        .map((e: unknown) => (isObject(e) && typeof e.message === 'string' ? e.message : undefined))
        .filter((m): m is string => Boolean(m))
    : [];
  return details.length > 0 ? `${base} (${details.join('; ')})` : base;
}

function headers(token: string): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    Accept: 'application/vnd.github+json',
    'Content-Type': 'application/json',
    'User-Agent': 'repo-launch-cli',
  };
}
