import type { RemoteBackend } from '../providers/types.js';
import { describeError, failure, type StageResult } from '../lib/result.js';
import { buildGithubOwnerRepo } from '../lib/github.js';
import { createLogger } from '../logger.js';
import type { RepositoryDescriptor } from '../types/launch.js';

const logger = createLogger();

/** One creation attempt; a repository exists afterwards only on success. */
export async function provisionRepository(
  backend: RemoteBackend,
  repo: RepositoryDescriptor,
): Promise<StageResult<string>> {
  logger.info(`Creating GitHub repository ${buildGithubOwnerRepo(repo.owner, repo.name)} (${repo.visibility})...`);
  let result: StageResult<string>;
  try {
    result = await backend.createRepository(repo);
  } catch (error) {
    return failure('provision', 'RemoteError', describeError(error));
  }
  if (result.ok) {
    logger.info(`✓ Repository created: ${result.value}`);
  }
  return result;
}
