import fs from 'node:fs';
import path from 'node:path';
import type { LaunchConfig } from '../config/config.js';
import type { RemoteBackend } from '../providers/types.js';
import { failure, forward, success, type StageResult } from '../lib/result.js';
import { which } from '../lib/exec.js';
import { isValidOwner, isValidRepoName } from '../lib/github.js';
import { createLogger } from '../logger.js';
import { configValue } from './git-vcs.js';
import type { Preflight, RepositoryDescriptor } from '../types/launch.js';

const logger = createLogger();

export const USAGE = 'Usage: repo-launch [options] OWNER REPO_NAME';

export function parseRepositoryArgs(
  args: readonly string[],
  project: LaunchConfig['project'],
): StageResult<RepositoryDescriptor> {
  if (args.length !== 2) {
    return failure('preconditions', 'ArgumentError', `Expected 2 arguments (OWNER REPO_NAME), got ${args.length}. ${USAGE}`);
  }
  const [owner, name] = args.map((a) => a.trim());
  if (!isValidOwner(owner)) {
    return failure('preconditions', 'ArgumentError', `Invalid owner "${owner}". ${USAGE}`);
  }
  if (!isValidRepoName(name)) {
    return failure('preconditions', 'ArgumentError', `Invalid repository name "${name}". ${USAGE}`);
  }
  return success({
    owner,
    name,
    visibility: project.visibility,
    description: project.description,
  });
}

export function checkTools(tools: readonly string[], pathEnv: string): StageResult<void> {
  for (const tool of tools) {
    const found = which(tool, pathEnv);
    if (!found) {
      return failure('preconditions', 'MissingTool', `${tool} not found on PATH`);
    }
    logger.debug(`Found ${tool} at ${found}`);
  }
  return success(undefined);
}

export function checkArtifacts(config: Pick<LaunchConfig, 'artifacts' | 'workspaceRoot'>): StageResult<string[]> {
  const verified: string[] = [];
  for (const artifact of config.artifacts) {
    const full = path.join(config.workspaceRoot, artifact.path);
    if (!isFile(full)) {
      return failure('preconditions', 'MissingArtifact', `Required file missing: ${artifact.path}`);
    }
    logger.info(`  ✓ ${artifact.path}`);
    verified.push(artifact.path);
  }
  return success(verified);
}

export function checkIdentity(cwd: string): StageResult<void> {
  const name = configValue('user.name', cwd);
  const email = configValue('user.email', cwd);
  if (!name || !email) {
    return failure(
      'preconditions',
      'MissingIdentity',
      "Git user.name or user.email not set. Run: git config --global user.name 'Your Name' && git config --global user.email 'you@example.com'",
    );
  }
  return success(undefined);
}

/**
 * Runs every check in order and stops at the first failure. Local checks
 * come first; the credential round-trip is the only network call.
 */
export async function validatePreconditions(
  args: readonly string[],
  config: LaunchConfig,
  backend: RemoteBackend,
): Promise<StageResult<Preflight>> {
  const repo = parseRepositoryArgs(args, config.project);
  if (!repo.ok) return repo;

  const tools = checkTools(backend.requiredTools, config.pathEnv);
  if (!tools.ok) return forward(tools);

  const present = backend.checkCredentialPresent();
  if (!present.ok) return forward(present);

  logger.info('Verifying required files...');
  const artifacts = checkArtifacts(config);
  if (!artifacts.ok) return forward(artifacts);

  const identity = checkIdentity(config.workspaceRoot);
  if (!identity.ok) return forward(identity);

  const credential = await backend.validateCredential();
  if (!credential.ok) return forward(credential);
  if (credential.value.login) {
    logger.info(`✓ Authenticated as: ${credential.value.login}`);
  }

  return success({ repo: repo.value, login: credential.value.login, artifacts: artifacts.value });
}

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}
