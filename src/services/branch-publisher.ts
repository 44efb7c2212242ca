import { failure, success, type StageResult } from '../lib/result.js';
import { outputOf, succeeded } from '../lib/exec.js';
import { createLogger } from '../logger.js';
import { redactCredentials } from '../lib/github.js';
import { runGit } from './git-vcs.js';
import type { BranchRef } from '../types/launch.js';

const logger = createLogger();

export interface BranchPublisherOptions {
  cwd: string;
  remote: string;
}

export class BranchPublisher {
  constructor(private readonly options: BranchPublisherOptions) {}

  /** Renames the current branch to the primary name and pushes it with upstream tracking. */
  publishPrimary(primary: BranchRef): StageResult<void> {
    const { cwd } = this.options;
    const renamed = runGit(['branch', '-M', primary.name], cwd);
    if (!succeeded(renamed)) {
      return failure('publish', 'VcsError', `git branch -M ${primary.name} failed: ${outputOf(renamed)}`);
    }
    return this.push(primary);
  }

  /** Cuts the feature branch from the current tip of its base and switches to it. */
  startFeature(feature: BranchRef): StageResult<void> {
    const args = ['checkout', '-b', feature.name];
    if (feature.base) args.push(feature.base.name);
    const res = runGit(args, this.options.cwd);
    if (!succeeded(res)) {
      return failure('publish', 'VcsError', `git checkout -b ${feature.name} failed: ${outputOf(res)}`);
    }
    logger.info(`Created feature branch: ${feature.name}`);
    return success(undefined);
  }

  publishFeature(feature: BranchRef): StageResult<void> {
    return this.push(feature);
  }

  private push(branch: BranchRef): StageResult<void> {
    const { cwd, remote } = this.options;
    logger.info(`Pushing ${branch.name} to ${remote}...`);
    const res = runGit(['push', '-u', remote, branch.name], cwd);
    if (!succeeded(res)) {
      return failure('publish', 'PushError', `git push ${remote} ${branch.name} failed: ${redactCredentials(outputOf(res))}`);
    }
    logger.info(`✓ Pushed ${branch.name}`);
    return success(undefined);
  }
}
