import type { Command } from 'commander';
import process from 'node:process';
import { resolveConfig, type LaunchConfig } from '../config/config.js';
import { createBackend } from '../providers/index.js';
import type { RemoteBackend } from '../providers/types.js';
import { runLaunch } from '../services/workflow.js';
import { formatFailure } from '../lib/result.js';
import { formatKeyValues, printOutput } from '../lib/printer.js';
import { repoSshUrl } from '../lib/github.js';
import { c } from '../lib/colors.js';
import { createLogger } from '../logger.js';
import type { LaunchOutcome, RepositoryDescriptor } from '../types/launch.js';

interface LaunchCommandOptions {
  backend?: string;
  private?: boolean;
  description?: string;
  chdir?: string;
  checkOnly?: boolean;
  json?: boolean;
}

export interface LaunchCommandHooks {
  env?: NodeJS.ProcessEnv;
  createBackend?: (config: LaunchConfig) => RemoteBackend;
}

export function registerLaunchCommand(program: Command, hooks: LaunchCommandHooks = {}): void {
  program
    .argument('[args...]', 'OWNER REPO_NAME')
    .option('-b, --backend <kind>', 'remote backend: api (REST + GITHUB_TOKEN) or gh (GitHub CLI session)')
    .option('--private', 'create the repository as private')
    .option('--description <text>', 'repository description')
    .option('-C, --chdir <path>', 'workspace directory (default: current directory)')
    .option('--check-only', 'run the precondition checks and stop')
    .option('-j, --json', 'print the result as JSON')
    .action(async (args: string[], options: LaunchCommandOptions) => {
      await handleLaunch(args, options, hooks);
    })
    .addHelpText(
      'after',
      `\nExamples:\n  $ repo-launch acme demo-pipeline\n  $ GITHUB_TOKEN=... repo-launch --backend api acme demo-pipeline\n  $ repo-launch --backend gh --private acme demo-pipeline\n  $ repo-launch --check-only acme demo-pipeline\n\nEnvironment:\n  GITHUB_TOKEN              Bearer token for the api backend (repo scope)\n  REPO_LAUNCH_BACKEND=api|gh Default backend\n  REPO_LAUNCH_CONFIG_PATH   Config file (default: repo-launch.config.yaml)\n  REPO_LAUNCH_LOG_LEVEL     debug|info|warn|error\n`,
    );
}

async function handleLaunch(args: string[], options: LaunchCommandOptions, hooks: LaunchCommandHooks): Promise<void> {
  const logger = createLogger();
  // Keep stdout clean for the JSON document.
  if (options.json) logger.setLevel('warn');
  const config = resolveConfig({
    cwd: options.chdir,
    env: hooks.env,
    backend: options.backend,
    private: options.private,
    description: options.description,
  });
  const backend = (hooks.createBackend ?? createBackend)(config);

  if (!options.json) {
    logger.info(c.heading(`=== GitHub Repo Creation (${backend.kind === 'api' ? 'REST API' : 'gh CLI'}) ===`));
    logger.info(`Owner: ${args[0] ?? ''}`);
    logger.info(`Repo:  ${args[1] ?? ''}`);
    logger.info('');
  }

  const result = await runLaunch(args, { config, backend }, { checkOnly: options.checkOnly });
  if (!result.ok) {
    logger.error(formatFailure(result.failure));
    process.exitCode = 1;
    return;
  }

  const { preflight, outcome } = result.value;
  if (!outcome) {
    printOutput({ ok: true, checked: true, login: preflight.login, artifacts: preflight.artifacts }, [
      c.ok('Preconditions satisfied; nothing was created.'),
    ], options);
    return;
  }

  if (outcome.remoteUrlHasToken) {
    for (const line of tokenNotice(config, preflight.repo)) logger.warn(line);
  }
  printOutput(launchPayload(outcome), renderOutcome(outcome), options);
}

export function launchPayload(outcome: LaunchOutcome): Record<string, unknown> {
  return {
    ok: true,
    repository: outcome.repositoryUrl,
    pullRequest: outcome.pullRequest,
    branches: outcome.branches,
  };
}

/** Success summary; the repository and pull request URLs are always the last two lines. */
export function renderOutcome(outcome: LaunchOutcome): string[] {
  const { url, number } = outcome.pullRequest;
  return [
    '',
    c.heading('========================================'),
    c.heading(`SUCCESS! PR #${number} opened`),
    c.heading('========================================'),
    '',
    ...formatKeyValues([
      ['Branches', outcome.branches.join(', ')],
    ]),
    '',
    'Next steps:',
    `  1. Review PR at: ${url}`,
    '  2. Wait for CI checks to pass',
    '  3. Merge when ready',
    '',
    `Repository: ${outcome.repositoryUrl}`,
    `Pull Request: ${url}`,
  ];
}

export function tokenNotice(config: Pick<LaunchConfig, 'remote' | 'github'>, repo: RepositoryDescriptor): string[] {
  return [
    `Token is stored in .git/config (remote ${config.remote} URL).`,
    `To remove: git remote set-url ${config.remote} ${repoSshUrl(config.github.host, repo.owner, repo.name)}`,
  ];
}
