import fs from 'node:fs';
import path from 'node:path';
import { failure, success, type StageResult } from '../lib/result.js';
import { outputOf, succeeded } from '../lib/exec.js';
import { redactCredentials } from '../lib/github.js';
import { createLogger } from '../logger.js';
import { hasGitDir, hasRemote, runGit, stagedFiles } from './git-vcs.js';
import type { CommitSpec } from '../types/launch.js';

const logger = createLogger();

export interface LocalSyncOptions {
  cwd: string;
  remote: string;
}

/** Owns the local workspace: init, remote binding and the two commits. */
export class LocalRepositorySynchronizer {
  constructor(private readonly options: LocalSyncOptions) {}

  /** Init (if needed), bind the remote, then record the initial commit. */
  prepareWorkspace(remoteUrl: string, commit: CommitSpec): StageResult<void> {
    const init = this.ensureRepository();
    if (!init.ok) return init;
    const bound = this.bindRemote(remoteUrl);
    if (!bound.ok) return bound;
    return this.commitAll(commit);
  }

  ensureRepository(): StageResult<void> {
    const { cwd } = this.options;
    if (hasGitDir(cwd)) {
      logger.debug(`Existing git repository at ${cwd}`);
      return success(undefined);
    }
    logger.info('Initializing git repository...');
    const res = runGit(['init'], cwd);
    if (!succeeded(res)) {
      return failure('sync', 'VcsError', `git init failed: ${outputOf(res)}`);
    }
    return success(undefined);
  }

  bindRemote(url: string): StageResult<void> {
    const { cwd, remote } = this.options;
    if (hasRemote(cwd, remote)) {
      const removed = runGit(['remote', 'remove', remote], cwd);
      if (!succeeded(removed)) {
        return failure('sync', 'VcsError', `git remote remove ${remote} failed: ${outputOf(removed)}`);
      }
    }
    const added = runGit(['remote', 'add', remote, url], cwd);
    if (!succeeded(added)) {
      return failure('sync', 'VcsError', `git remote add ${remote} failed: ${outputOf(added)}`);
    }
    logger.info(`✓ Remote ${remote} -> ${redactCredentials(url)}`);
    return success(undefined);
  }

  commitAll(commit: CommitSpec): StageResult<void> {
    return this.commit(['add', '-A'], commit);
  }

  /** Appends `section` to every file the commit names, then commits exactly those files. */
  recordFollowUp(section: string, commit: CommitSpec): StageResult<void> {
    const files = [...commit.paths];
    if (files.length === 0) {
      return failure('sync', 'VcsError', 'Nothing to commit: no paths given');
    }
    for (const file of files) {
      try {
        fs.appendFileSync(path.join(this.options.cwd, file), section, 'utf8');
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return failure('sync', 'VcsError', `Unable to update ${file}: ${message}`);
      }
    }
    return this.commit(['add', '--', ...files], commit);
  }

  private commit(addArgs: string[], commit: CommitSpec): StageResult<void> {
    const { cwd } = this.options;
    const added = runGit(addArgs, cwd);
    if (!succeeded(added)) {
      return failure('sync', 'VcsError', `git ${addArgs.join(' ')} failed: ${outputOf(added)}`);
    }
    const staged = stagedFiles(cwd);
    if (staged.length === 0) {
      return failure('sync', 'VcsError', 'Nothing to commit: no staged changes');
    }
    const res = runGit(['commit', '-m', commit.message], cwd);
    if (!succeeded(res)) {
      return failure('sync', 'VcsError', `git commit failed: ${outputOf(res)}`);
    }
    logger.info(`✓ Committed ${staged.length} file(s): ${commit.message.split('\n')[0]}`);
    return success(undefined);
  }
}
