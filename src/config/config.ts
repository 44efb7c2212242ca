import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import Ajv2020 from 'ajv/dist/2020.js';
import addFormatsImport from 'ajv-formats';
import type { ErrorObject, ValidateFunction } from 'ajv';
import YAML from 'yaml';
import { createLogger } from '../logger.js';
import { apiBaseForHost } from '../lib/github.js';
import type { BackendKind, RequiredArtifact, Visibility } from '../types/launch.js';

const CONFIG_FILE_CANDIDATES = ['repo-launch.config.yaml', 'repo-launch.config.yml'];
const SCHEMA_FILE = 'repo-launch.config.schema.json';

export const DEFAULT_ARTIFACTS: readonly RequiredArtifact[] = [
  { path: 'README.md', summary: 'Project documentation and usage' },
  { path: 'analyze.py', summary: 'Analysis entry point (scoring algorithm)' },
  { path: 'requirements.txt', summary: 'Dependency manifest' },
  { path: 'test_smoke.csv', summary: 'Smoke-test dataset' },
  { path: '.github/workflows/ci.yml', summary: 'CI pipeline with smoke tests' },
];

export interface GithubConfig {
  host: string;
  apiBase: string;
}

export interface BranchConfig {
  primary: string;
  feature: string;
}

export interface ProjectConfig {
  title: string;
  description: string;
  visibility: Visibility;
}

export interface LaunchConfig {
  workspaceRoot: string;
  backend: BackendKind;
  github: GithubConfig;
  /** Bearer token for the api backend; never written anywhere except the push URL. */
  token?: string;
  /** Search path used to resolve external tools. */
  pathEnv: string;
  remote: string;
  branches: BranchConfig;
  project: ProjectConfig;
  artifacts: RequiredArtifact[];
}

export interface LaunchConfigFile {
  backend?: BackendKind;
  remote?: string;
  github?: Partial<GithubConfig>;
  branches?: Partial<BranchConfig>;
  project?: Partial<ProjectConfig>;
  artifacts?: RequiredArtifact[];
}

export interface ResolveConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  backend?: string;
  private?: boolean;
  description?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type AjvInstance = {
  compile: (schema: unknown) => ValidateFunction<unknown>;
};

const AjvCtor = Ajv2020 as unknown as new (options?: Record<string, unknown>) => AjvInstance;
const addFormats = addFormatsImport as unknown as (ajv: AjvInstance) => void;

const logger = createLogger();

let cachedValidator: ValidateFunction<unknown> | undefined;

export function resolveConfig(options: ResolveConfigOptions = {}): LaunchConfig {
  const env = options.env ?? process.env;
  const workspaceRoot = fs.realpathSync(options.cwd ?? process.cwd());
  const configPath = locateConfigFile(workspaceRoot, env);
  const fromFile = configPath ? loadConfigFile(configPath) : {};
  if (configPath) logger.debug(`Loaded config from ${configPath}`);

  const token = env.GITHUB_TOKEN?.trim() || undefined;
  const backend = resolveBackend(options.backend ?? env.REPO_LAUNCH_BACKEND ?? fromFile.backend, token);
  const host = fromFile.github?.host ?? 'github.com';
  const title = fromFile.project?.title ?? 'Integer Resonance CRISPR';

  let visibility: Visibility = fromFile.project?.visibility ?? 'public';
  if (options.private === true) visibility = 'private';

  return {
    workspaceRoot,
    backend,
    github: {
      host,
      apiBase: (fromFile.github?.apiBase ?? apiBaseForHost(host)).replace(/\/+$/, ''),
    },
    token,
    pathEnv: env.PATH ?? '',
    remote: fromFile.remote ?? 'origin',
    branches: {
      primary: fromFile.branches?.primary ?? 'main',
      feature: fromFile.branches?.feature ?? 'feature/prototype-pipeline',
    },
    project: {
      title,
      description:
        options.description ?? fromFile.project?.description ?? 'Integer Resonance scoring for CRISPR gRNA design',
      visibility,
    },
    artifacts: fromFile.artifacts ?? DEFAULT_ARTIFACTS.map((a) => ({ ...a })),
  };
}

function resolveBackend(raw: string | undefined, token: string | undefined): BackendKind {
  if (raw === undefined || raw === '') {
    return token ? 'api' : 'gh';
  }
  if (raw === 'api' || raw === 'gh') return raw;
  throw new ConfigError(`Unknown backend "${raw}". Expected "api" or "gh".`);
}

function locateConfigFile(workspaceRoot: string, env: NodeJS.ProcessEnv): string | undefined {
  const fromEnv = env.REPO_LAUNCH_CONFIG_PATH;
  if (fromEnv) {
    const resolved = path.resolve(workspaceRoot, fromEnv);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`REPO_LAUNCH_CONFIG_PATH points to a missing file: ${resolved}`);
    }
    return resolved;
  }
  for (const candidate of CONFIG_FILE_CANDIDATES) {
    const filePath = path.join(workspaceRoot, candidate);
    if (fs.existsSync(filePath)) return filePath;
  }
  return undefined;
}

export function loadConfigFile(configPath: string): LaunchConfigFile {
  const text = fs.readFileSync(configPath, 'utf8');
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse ${configPath}: ${message}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isConfigFile(parsed)) {
    throw new ConfigError(`Invalid config at ${configPath}: ${formatErrors(getValidator().errors)}`);
  }
  return parsed;
}

function isConfigFile(value: unknown): value is LaunchConfigFile {
  return getValidator()(value);
}

function getValidator(): ValidateFunction<unknown> {
  if (cachedValidator) return cachedValidator;
  const ajv = new AjvCtor({ allErrors: true, strict: false });
  addFormats(ajv);
  const schemaPath = path.join(packageRoot(), 'schema', SCHEMA_FILE);
  const schema: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf8'));
  cachedValidator = ajv.compile(schema);
  return cachedValidator;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'does not match schema';
  return errors.map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('; ');
}

function packageRoot(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new ConfigError('Unable to locate the repo-launch package root');
    }
    dir = parent;
  }
}
