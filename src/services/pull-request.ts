import type { RemoteBackend } from '../providers/types.js';
import { describeError, failure, type StageResult } from '../lib/result.js';
import { createLogger } from '../logger.js';
import type { PullRequestRef, PullRequestSpec, RepositoryDescriptor } from '../types/launch.js';

const logger = createLogger();

export async function openPullRequest(
  backend: RemoteBackend,
  repo: RepositoryDescriptor,
  spec: PullRequestSpec,
): Promise<StageResult<PullRequestRef>> {
  logger.info(`Creating pull request ${spec.head.name} -> ${spec.base.name}...`);
  let result: StageResult<PullRequestRef>;
  try {
    result = await backend.openPullRequest(repo, spec);
  } catch (error) {
    return failure('pull-request', 'RemoteError', describeError(error));
  }
  if (result.ok) {
    logger.info(`✓ Pull request created: PR #${result.value.number}`);
  }
  return result;
}
