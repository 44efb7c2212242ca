import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { outputOf, which } from '../../src/lib/exec.js';
import { makeBin, makeTempDir } from '../helpers/fixtures.js';

describe('which', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('repo-launch-which-');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('finds executables across PATH entries', () => {
    const bin = makeBin(root, ['gh']);
    const pathEnv = ['', path.join(root, 'missing'), bin].join(':');
    expect(which('gh', pathEnv, 'linux')).toBe(path.join(bin, 'gh'));
    expect(which('git', pathEnv, 'linux')).toBeUndefined();
  });

  it('ignores files without the executable bit and directories', () => {
    const bin = path.join(root, 'bin');
    fs.mkdirSync(path.join(bin, 'git'), { recursive: true });
    fs.writeFileSync(path.join(bin, 'gh'), '', { mode: 0o644 });
    expect(which('git', bin, 'linux')).toBeUndefined();
    expect(which('gh', bin, 'linux')).toBeUndefined();
  });
});

describe('outputOf', () => {
  it('prefers spawn errors, then stderr, then stdout', () => {
    expect(outputOf({ status: null, stdout: '', stderr: '', error: 'spawn gh ENOENT' })).toBe('spawn gh ENOENT');
    expect(outputOf({ status: 1, stdout: 'out', stderr: ' err \n' })).toBe('err');
    expect(outputOf({ status: 1, stdout: 'out\n', stderr: '' })).toBe('out');
    expect(outputOf({ status: 2, stdout: '', stderr: '' })).toBe('exit status 2');
  });
});
