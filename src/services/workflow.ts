import type { LaunchConfig } from '../config/config.js';
import type { RemoteBackend } from '../providers/types.js';
import { forward, success, type StageResult } from '../lib/result.js';
import { c } from '../lib/colors.js';
import { createLogger } from '../logger.js';
import { validatePreconditions } from './preconditions.js';
import { provisionRepository } from './provisioner.js';
import { LocalRepositorySynchronizer } from './local-sync.js';
import { BranchPublisher } from './branch-publisher.js';
import { openPullRequest } from './pull-request.js';
import {
  developmentSection,
  followUpCommit,
  initialCommit,
  planBranches,
  pullRequestSpec,
  readmeArtifact,
} from './launch-content.js';
import type { LaunchOutcome, Preflight } from '../types/launch.js';

const logger = createLogger();

export interface LaunchDeps {
  config: LaunchConfig;
  backend: RemoteBackend;
}

export interface LaunchOptions {
  /** Stop after the precondition checks; nothing is created or committed. */
  checkOnly?: boolean;
}

export interface LaunchReport {
  preflight: Preflight;
  outcome?: LaunchOutcome;
}

/**
 * Runs the whole bootstrap sequence. Each stage must succeed before the
 * next starts; the first failure is returned as-is and nothing after it runs.
 * Nothing already created is rolled back.
 */
export async function runLaunch(
  args: readonly string[],
  deps: LaunchDeps,
  options: LaunchOptions = {},
): Promise<StageResult<LaunchReport>> {
  const { config, backend } = deps;

  logger.info(c.step('Checking prerequisites...'));
  const preflight = await validatePreconditions(args, config, backend);
  if (!preflight.ok) return forward(preflight);
  logger.info(c.ok('✓ All prerequisites met'));
  if (options.checkOnly) {
    return success({ preflight: preflight.value });
  }

  const repo = preflight.value.repo;
  const created = await provisionRepository(backend, repo);
  if (!created.ok) return forward(created);

  const sync = new LocalRepositorySynchronizer({ cwd: config.workspaceRoot, remote: config.remote });
  const publisher = new BranchPublisher({ cwd: config.workspaceRoot, remote: config.remote });
  const branches = planBranches(config);

  const prepared = sync.prepareWorkspace(backend.pushUrl(repo), initialCommit(config));
  if (!prepared.ok) return forward(prepared);

  const primary = publisher.publishPrimary(branches.primary);
  if (!primary.ok) return forward(primary);

  const cut = publisher.startFeature(branches.feature);
  if (!cut.ok) return forward(cut);

  const followUp = sync.recordFollowUp(developmentSection(config), followUpCommit(readmeArtifact(config)));
  if (!followUp.ok) return forward(followUp);

  const feature = publisher.publishFeature(branches.feature);
  if (!feature.ok) return forward(feature);

  const pr = await openPullRequest(backend, repo, pullRequestSpec(config));
  if (!pr.ok) return forward(pr);

  return success({
    preflight: preflight.value,
    outcome: {
      repositoryUrl: created.value,
      pullRequest: pr.value,
      branches: [branches.primary.name, branches.feature.name],
      remoteUrlHasToken: backend.credential.kind === 'bearer-token',
    },
  });
}
