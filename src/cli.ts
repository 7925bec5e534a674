#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { DownstreamSync } from './downstream-sync';
import { GlobTrackedFileEnumerator } from './enumerator';
import { writeDefaultConfiguration, getConfigPath } from './config';
import { CopyFailure, MissingDestinationError, SyncError } from './errors';
import { USAGE } from './constants';

interface SyncCommandOptions {
  source: string;
  git: boolean;
  interactive?: boolean;
}

function fail(error: unknown): never {
  if (error instanceof MissingDestinationError) {
    for (const destination of error.missing) {
      console.error(chalk.red(`ERROR: ${destination} does not exist`));
    }
  } else if (error instanceof CopyFailure) {
    console.error(chalk.red('Error:'), error.message);
    console.error(chalk.yellow(`${error.copied} file(s) were copied before the failure; run again to finish`));
  } else {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error(chalk.red('Error:'), errorMessage);
  }
  process.exit(error instanceof SyncError ? error.exitCode : 1);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('downstream-sync')
    .description('Mirror tracked headers and scheduler sources into a downstream tree')
    .version('1.0.0');

  program
    .command('sync <downstream-root>', { isDefault: true })
    .description('Copy changed files into an already prepared downstream tree')
    .option('-C, --source <dir>', 'source repository root', process.cwd())
    .option('--no-git', 'list files from the filesystem instead of git ls-files')
    .option('-i, --interactive', 'confirm before copying changed files')
    .allowExcessArguments(false)
    .showHelpAfterError(USAGE)
    .action(async (downstreamRoot: string, options: SyncCommandOptions) => {
      try {
        const sync = new DownstreamSync({
          sourceRoot: options.source,
          enumerator: options.git ? undefined : new GlobTrackedFileEnumerator(options.source)
        });
        sync.init();
        await sync.run(downstreamRoot, { interactive: options.interactive });
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('chain')
    .description('Print the chained build targets as JSON')
    .option('-C, --source <dir>', 'source repository root', process.cwd())
    .action((options: { source: string }) => {
      try {
        const sync = new DownstreamSync({ sourceRoot: options.source });
        sync.init();
        console.log(JSON.stringify(sync.chain(), null, 2));
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('init')
    .description('Write a default configuration file')
    .option('-C, --source <dir>', 'source repository root', process.cwd())
    .action(async (options: { source: string }) => {
      const configPath = getConfigPath(options.source);
      if (await writeDefaultConfiguration(options.source)) {
        console.log(chalk.green('✓'), `Created ${configPath}`);
      } else {
        console.log(chalk.yellow(`${configPath} already exists`));
      }
    });

  return program;
}

export const program = createProgram();

if (require.main === module) {
  program.parseAsync(process.argv).catch(fail);
}
