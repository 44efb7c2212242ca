import fs from 'node:fs';
import path from 'node:path';
import { spawnSync } from 'node:child_process';

export interface RunResult {
  status: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be spawned at all. */
  error?: string;
}

export interface RunOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

export function runTool(tool: string, args: string[], options: RunOptions): RunResult {
  const res = spawnSync(tool, args, { cwd: options.cwd, env: options.env, encoding: 'utf8' });
  return {
    status: res.status,
    stdout: res.stdout ?? '',
    stderr: res.stderr ?? '',
    error: res.error?.message,
  };
}

export function succeeded(res: RunResult): boolean {
  return (res.status ?? 1) === 0 && !res.error;
}

/** Best single-line explanation of a failed invocation. */
export function outputOf(res: RunResult): string {
  return res.error ?? (res.stderr.trim() || res.stdout.trim() || `exit status ${res.status ?? 'unknown'}`);
}

function isExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function which(cmd: string, pathEnv: string, platform: NodeJS.Platform = process.platform): string | undefined {
  const sep = platform === 'win32' ? ';' : ':';
  for (const dir of pathEnv.split(sep)) {
    if (!dir) continue;
    const full = path.join(dir, cmd);
    if (isExecutable(full)) return full;
    if (platform === 'win32') {
      for (const ext of ['.exe', '.cmd']) {
        if (isExecutable(full + ext)) return full + ext;
      }
    }
  }
  return undefined;
}
