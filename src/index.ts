#!/usr/bin/env node
import { Command } from 'commander';
import process from 'node:process';
import { createRequire } from 'node:module';
import { registerLaunchCommand } from './commands/launch.js';
import { createLogger } from './logger.js';
import { setEnabled as setColorEnabled } from './lib/colors.js';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const logger = createLogger();

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('repo-launch')
    .description('Create a GitHub repository from the working tree, push main and a feature branch, and open a pull request')
    .version(pkg.version)
    .option('-v, --verbose', 'enable verbose logging')
    .option('-q, --quiet', 'suppress non-error output')
    .option('--no-color', 'disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      const baseColor = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined;
      setColorEnabled(opts.color !== false && baseColor);
      if (opts.verbose) {
        logger.setLevel('debug');
        logger.debug('Verbose mode enabled');
      } else if (opts.quiet) {
        logger.setLevel('warn');
      }
    });

  registerLaunchCommand(program);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    logger.error(String(error instanceof Error ? error.message : error));
    if (error instanceof Error && logger.isVerbose()) {
      logger.error(error.stack ?? '');
    }
    process.exitCode = 1;
  }
}

await main();
