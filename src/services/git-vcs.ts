import fs from 'node:fs';
import path from 'node:path';
import { runTool, succeeded, type RunResult } from '../lib/exec.js';
import { redactCredentials } from '../lib/github.js';
import { createLogger } from '../logger.js';

const logger = createLogger();

export function runGit(args: string[], cwd: string): RunResult {
  logger.debug(`git ${args.map(redactCredentials).join(' ')}`);
  return runTool('git', args, { cwd });
}

/** True when the workspace carries its own `.git` control directory. */
export function hasGitDir(cwd: string): boolean {
  return fs.existsSync(path.join(cwd, '.git'));
}

export function hasRemote(cwd: string, name = 'origin'): boolean {
  const res = runGit(['remote'], cwd);
  if (!succeeded(res)) return false;
  return res.stdout.split(/\r?\n/).map((s) => s.trim()).filter(Boolean).includes(name);
}

export function configValue(key: string, cwd: string): string {
  const res = runGit(['config', '--get', key], cwd);
  return succeeded(res) ? res.stdout.trim() : '';
}

export function stagedFiles(cwd: string): string[] {
  const res = runGit(['diff', '--cached', '--name-only'], cwd);
  if (!succeeded(res)) return [];
  return res.stdout.split(/\r?\n/).map((s) => s.trim()).filter(Boolean);
}
