import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { SpawnSyncReturns } from 'node:child_process';
import { DEFAULT_ARTIFACTS, type LaunchConfig } from '../../src/config/config.js';

export function spawnResult(status: number, stdout = '', stderr = ''): SpawnSyncReturns<string> {
  return { pid: 0, output: [null, stdout, stderr], stdout, stderr, status, signal: null };
}

export interface Invocation {
  cmd: string;
  args: string[];
}

export type SpawnHandler = (cmd: string, args: string[]) => SpawnSyncReturns<string> | undefined;

/** Records every spawn and answers with `handler`, defaulting to exit 0. */
export function recorder(handler: SpawnHandler = () => undefined) {
  const calls: Invocation[] = [];
  const impl = (cmd: string, args?: readonly string[]): SpawnSyncReturns<string> => {
    const list = [...(args ?? [])];
    calls.push({ cmd, args: list });
    return handler(cmd, list) ?? spawnResult(0);
  };
  return { calls, impl };
}

/** Answers the git queries the launch sequence makes, as a configured repo with staged changes. */
export function gitWorld(overrides: SpawnHandler = () => undefined): SpawnHandler {
  return (cmd, args) => {
    const custom = overrides(cmd, args);
    if (custom) return custom;
    if (cmd !== 'git') return undefined;
    if (args[0] === 'config' && args[2] === 'user.name') return spawnResult(0, 'Test User\n');
    if (args[0] === 'config' && args[2] === 'user.email') return spawnResult(0, 'test@example.com\n');
    if (args[0] === 'remote' && args.length === 1) return spawnResult(0, '');
    if (args[0] === 'diff' && args[1] === '--cached') return spawnResult(0, 'README.md\n');
    return undefined;
  };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeArtifacts(root: string, skip: string[] = []): void {
  for (const artifact of DEFAULT_ARTIFACTS) {
    if (skip.includes(artifact.path)) continue;
    const full = path.join(root, artifact.path);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, `# ${artifact.path}\n`, 'utf8');
  }
}

/** Creates empty executables so PATH lookups succeed. */
export function makeBin(root: string, tools: string[]): string {
  const bin = path.join(root, '.bin');
  fs.mkdirSync(bin, { recursive: true });
  for (const tool of tools) {
    const file = path.join(bin, tool);
    fs.writeFileSync(file, '#!/bin/sh\nexit 0\n', 'utf8');
    fs.chmodSync(file, 0o755);
  }
  return bin;
}

export function testConfig(root: string, overrides: Partial<LaunchConfig> = {}): LaunchConfig {
  return {
    workspaceRoot: root,
    backend: 'api',
    github: { host: 'github.com', apiBase: 'https://api.github.com' },
    token: 'test-token',
    pathEnv: path.join(root, '.bin'),
    remote: 'origin',
    branches: { primary: 'main', feature: 'feature/prototype-pipeline' },
    project: {
      title: 'Demo Pipeline',
      description: 'Demo scoring pipeline',
      visibility: 'public',
    },
    artifacts: DEFAULT_ARTIFACTS.map((a) => ({ ...a })),
    ...overrides,
  };
}
