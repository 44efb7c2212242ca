import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_ARTIFACTS, resolveConfig } from '../../src/config/config.js';
import { makeTempDir } from '../helpers/fixtures.js';

describe('resolveConfig', () => {
  let root: string;

  beforeEach(() => {
    root = fs.realpathSync(makeTempDir('repo-launch-config-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function writeConfig(text: string, name = 'repo-launch.config.yaml'): string {
    const file = path.join(root, name);
    fs.writeFileSync(file, text, 'utf8');
    return file;
  }

  it('falls back to the built-in project when no file is present', () => {
    const config = resolveConfig({ cwd: root, env: { PATH: '/usr/bin' } });

    expect(config.workspaceRoot).toBe(root);
    expect(config.backend).toBe('gh');
    expect(config.token).toBeUndefined();
    expect(config.pathEnv).toBe('/usr/bin');
    expect(config.github).toEqual({ host: 'github.com', apiBase: 'https://api.github.com' });
    expect(config.remote).toBe('origin');
    expect(config.branches).toEqual({ primary: 'main', feature: 'feature/prototype-pipeline' });
    expect(config.project).toEqual({
      title: 'Integer Resonance CRISPR',
      description: 'Integer Resonance scoring for CRISPR gRNA design',
      visibility: 'public',
    });
    expect(config.artifacts).toEqual(DEFAULT_ARTIFACTS);
  });

  it('carries only the settings the run consumes', () => {
    const config = resolveConfig({ cwd: root, env: {} });
    expect(Object.keys(config).sort()).toEqual([
      'artifacts',
      'backend',
      'branches',
      'github',
      'pathEnv',
      'project',
      'remote',
      'token',
      'workspaceRoot',
    ]);
  });

  it('picks the api backend when a token is exported', () => {
    const config = resolveConfig({ cwd: root, env: { GITHUB_TOKEN: ' test-token \n' } });
    expect(config.backend).toBe('api');
    expect(config.token).toBe('test-token');
  });

  it('lets the option beat the environment and the environment beat the file', () => {
    writeConfig('backend: api\n');
    expect(resolveConfig({ cwd: root, env: {} }).backend).toBe('api');
    expect(resolveConfig({ cwd: root, env: { REPO_LAUNCH_BACKEND: 'gh' } }).backend).toBe('gh');
    expect(resolveConfig({ cwd: root, env: { REPO_LAUNCH_BACKEND: 'gh' }, backend: 'api' }).backend).toBe('api');
  });

  it('rejects an unknown backend name', () => {
    expect(() => resolveConfig({ cwd: root, env: {}, backend: 'svn' })).toThrow(
      new ConfigError('Unknown backend "svn". Expected "api" or "gh".'),
    );
  });

  it('merges the project file over the defaults', () => {
    writeConfig(
      [
        'remote: upstream',
        'github:',
        '  host: git.example.com',
        'branches:',
        '  feature: feature/scoring',
        'project:',
        '  title: Demo Pipeline',
        '  visibility: private',
        'artifacts:',
        '  - path: README.md',
        '    summary: Docs',
        '',
      ].join('\n'),
      'repo-launch.config.yml',
    );

    const config = resolveConfig({ cwd: root, env: {}, description: 'From the flag' });

    expect(config.remote).toBe('upstream');
    expect(config.github).toEqual({ host: 'git.example.com', apiBase: 'https://git.example.com/api/v3' });
    expect(config.branches).toEqual({ primary: 'main', feature: 'feature/scoring' });
    expect(config.project).toEqual({ title: 'Demo Pipeline', description: 'From the flag', visibility: 'private' });
    expect(config.artifacts).toEqual([{ path: 'README.md', summary: 'Docs' }]);
  });

  it('forces private visibility with the private option', () => {
    writeConfig('project:\n  visibility: public\n');
    expect(resolveConfig({ cwd: root, env: {}, private: true }).project.visibility).toBe('private');
  });

  it('trims a trailing slash from an explicit API base', () => {
    writeConfig('github:\n  apiBase: https://git.example.com/api/v3/\n');
    expect(resolveConfig({ cwd: root, env: {} }).github.apiBase).toBe('https://git.example.com/api/v3');
  });

  it('treats an empty file as no overrides', () => {
    writeConfig('');
    expect(resolveConfig({ cwd: root, env: {} }).remote).toBe('origin');
  });

  it('loads the file named by REPO_LAUNCH_CONFIG_PATH', () => {
    fs.mkdirSync(path.join(root, 'conf'));
    fs.writeFileSync(path.join(root, 'conf', 'launch.yaml'), 'remote: mirror\n', 'utf8');

    const config = resolveConfig({ cwd: root, env: { REPO_LAUNCH_CONFIG_PATH: 'conf/launch.yaml' } });

    expect(config.remote).toBe('mirror');
  });

  it('fails when REPO_LAUNCH_CONFIG_PATH names a missing file', () => {
    expect(() => resolveConfig({ cwd: root, env: { REPO_LAUNCH_CONFIG_PATH: 'nope.yaml' } })).toThrow(
      `REPO_LAUNCH_CONFIG_PATH points to a missing file: ${path.join(root, 'nope.yaml')}`,
    );
  });

  it('reports YAML syntax errors as ConfigError', () => {
    writeConfig('project: [unclosed\n');
    expect(() => resolveConfig({ cwd: root, env: {} })).toThrow(ConfigError);
  });

  it('validates the file against the schema', () => {
    writeConfig('backend: svn\n');
    expect(() => resolveConfig({ cwd: root, env: {} })).toThrow(/\/backend must be equal to one of the allowed values/);

    writeConfig('artifacts: []\n');
    expect(() => resolveConfig({ cwd: root, env: {} })).toThrow(ConfigError);

    writeConfig('unknown: true\n');
    expect(() => resolveConfig({ cwd: root, env: {} })).toThrow(/must NOT have additional properties/);
  });
});
