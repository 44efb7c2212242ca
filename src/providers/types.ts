import type { StageResult } from '../lib/result.js';
import type {
  BackendKind,
  CredentialContext,
  PullRequestRef,
  PullRequestSpec,
  RepositoryDescriptor,
} from '../types/launch.js';

export interface CredentialIdentity {
  login?: string;
}

export interface RemoteBackend {
  readonly kind: BackendKind;
  readonly credential: CredentialContext;
  /** Executables that must resolve on PATH before the backend can run. */
  readonly requiredTools: readonly string[];
  /** Local check only: is a credential configured at all? Never touches the network. */
  checkCredentialPresent(): StageResult<void>;
  validateCredential(): Promise<StageResult<CredentialIdentity>>;
  createRepository(repo: RepositoryDescriptor): Promise<StageResult<string>>;
  /** URL bound to the git remote that pushes go through. */
  pushUrl(repo: RepositoryDescriptor): string;
  openPullRequest(repo: RepositoryDescriptor, spec: PullRequestSpec): Promise<StageResult<PullRequestRef>>;
}
