import * as path from 'path';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { BuildGraph, Configuration, FileMapping, SyncReport, TrackedFileEnumerator } from './types';
import { loadConfiguration } from './config';
import { GitTrackedFileEnumerator, collectTrackedFiles } from './enumerator';
import { buildMappings } from './path-mapper';
import { assertDestinationsExist } from './existence-validator';
import { SyncPlan, applySyncPlan, computeSyncPlan } from './diff-sync';
import { buildChain } from './build-chainer';

export interface DownstreamSyncOptions {
  sourceRoot?: string;
  enumerator?: TrackedFileEnumerator;
  configuration?: Configuration;
}

export interface RunOptions {
  interactive?: boolean;
}

export class DownstreamSync {
  private config: Configuration | null;
  private readonly sourceRoot: string;
  private readonly enumerator: TrackedFileEnumerator;

  constructor(options: DownstreamSyncOptions = {}) {
    this.sourceRoot = path.resolve(options.sourceRoot ?? process.cwd());
    this.enumerator = options.enumerator ?? new GitTrackedFileEnumerator(this.sourceRoot);
    this.config = options.configuration ?? null;
  }

  init(): Configuration {
    if (!this.config) {
      this.config = loadConfiguration(this.sourceRoot);
    }
    return this.config;
  }

  private get configuration(): Configuration {
    if (!this.config) throw new Error('Configuration not loaded');
    return this.config;
  }

  resolveDownstreamRoot(downstreamTree: string): string {
    return path.join(downstreamTree, this.configuration.downstreamSubdir);
  }

  planMappings(downstreamTree: string): FileMapping[] {
    const config = this.configuration;
    const tracked = collectTrackedFiles(this.enumerator, config);
    return buildMappings(tracked, {
      downstreamRoot: this.resolveDownstreamRoot(downstreamTree),
      allowList: config.schedulers.allowList
    });
  }

  async run(downstreamTree: string, options: RunOptions = {}): Promise<SyncReport> {
    const config = this.configuration;
    const mappings = this.planMappings(downstreamTree);
    const headerCount = mappings.filter(mapping => mapping.category === 'header').length;

    console.log(
      chalk.blue('→'),
      `Syncing ${headerCount} headers and ${mappings.length - headerCount} scheduler source files to ${this.resolveDownstreamRoot(downstreamTree)}`
    );

    assertDestinationsExist(mappings);

    const plan = computeSyncPlan(mappings, {
      sourceRoot: this.sourceRoot,
      manifestRule: config.manifest
    });

    if (options.interactive && !(await this.confirmPlan(plan))) {
      console.log(chalk.yellow('Sync cancelled, no files were copied'));
      const skipped = plan.entries.filter(entry => !entry.changed).length;
      return { total: mappings.length, missing: 0, skipped, copied: 0 };
    }

    const { report } = applySyncPlan(plan);
    console.log(chalk.green('✓'), `Skipped ${report.skipped} unchanged files`);
    return report;
  }

  private async confirmPlan(plan: SyncPlan): Promise<boolean> {
    const changed = plan.entries.filter(entry => entry.changed);
    if (changed.length === 0) {
      return true;
    }

    console.log(chalk.bold('\nFiles to sync:\n'));
    for (const entry of changed) {
      console.log(chalk.gray(`  ${entry.mapping.source} → ${entry.mapping.destination}`));
    }

    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: `Copy ${changed.length} changed file(s)?`,
        default: true
      }
    ]);
    return confirm;
  }

  chain(): BuildGraph {
    const { chain } = this.configuration;
    return buildChain(chain.targets, chain.aggregate);
  }
}

export default DownstreamSync;
