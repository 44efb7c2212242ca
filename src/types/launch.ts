export type Visibility = 'public' | 'private';

export type BackendKind = 'api' | 'gh';

export interface RepositoryDescriptor {
  readonly owner: string;
  readonly name: string;
  readonly visibility: Visibility;
  readonly description: string;
}

export type CredentialContext =
  | { kind: 'interactive-session' }
  | { kind: 'bearer-token'; token: string };

export interface RequiredArtifact {
  path: string;
  summary: string;
}

export interface CommitSpec {
  message: string;
  /** Files the commit records. A follow-up commit stages exactly these. */
  paths: ReadonlySet<string>;
}

export interface BranchRef {
  name: string;
  base?: BranchRef;
}

export interface PullRequestSpec {
  title: string;
  body: string;
  head: BranchRef;
  base: BranchRef;
}

export interface PullRequestRef {
  number: number;
  url: string;
}

export interface Preflight {
  repo: RepositoryDescriptor;
  login?: string;
  artifacts: string[];
}

export interface LaunchOutcome {
  repositoryUrl: string;
  pullRequest: PullRequestRef;
  branches: [string, string];
  /** True when the bound remote URL carries the access token. */
  remoteUrlHasToken: boolean;
}
