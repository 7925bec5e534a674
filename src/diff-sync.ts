import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import { FileMapping, SyncReport, SyncedFile, TransformRule } from './types';
import { isManifest, transformManifest } from './manifest-transformer';
import { CopyFailure } from './errors';

export interface SyncOptions {
  sourceRoot: string;
  manifestRule: TransformRule;
}

export interface SyncPlanEntry {
  mapping: FileMapping;
  content: Buffer;
  rewritten: boolean;
  changed: boolean;
}

export interface SyncPlan {
  entries: SyncPlanEntry[];
  manifestRule: TransformRule;
}

export interface SyncResult {
  report: SyncReport;
  synced: SyncedFile[];
}

function effectiveContent(
  mapping: FileMapping,
  options: SyncOptions
): { content: Buffer; rewritten: boolean } {
  const raw = fs.readFileSync(path.join(options.sourceRoot, mapping.source));
  if (!isManifest(mapping.source, options.manifestRule)) {
    return { content: raw, rewritten: false };
  }

  // latin1 maps every byte to one char, so bytes outside the rewritten line survive
  const original = raw.toString('latin1');
  const transformed = transformManifest(original, options.manifestRule);
  if (transformed === original) {
    return { content: raw, rewritten: false };
  }
  return { content: Buffer.from(transformed, 'latin1'), rewritten: true };
}

export function computeSyncPlan(mappings: FileMapping[], options: SyncOptions): SyncPlan {
  const entries = mappings.map(mapping => {
    const { content, rewritten } = effectiveContent(mapping, options);
    const current = fs.readFileSync(mapping.destination);
    return { mapping, content, rewritten, changed: !content.equals(current) };
  });
  return { entries, manifestRule: options.manifestRule };
}

/**
 * Writes every changed entry in plan order. The first failed write aborts the
 * run; files copied before it stay copied.
 */
export function applySyncPlan(plan: SyncPlan): SyncResult {
  const synced: SyncedFile[] = [];
  let skipped = 0;

  for (const entry of plan.entries) {
    const { mapping } = entry;
    if (!entry.changed) {
      skipped++;
      continue;
    }

    const note = entry.rewritten
      ? ` (dropped path from ${plan.manifestRule.dependency} dependency)`
      : '';
    console.log(chalk.gray(`  Syncing ${mapping.source}${note}`));

    try {
      fs.writeFileSync(mapping.destination, entry.content);
    } catch (error) {
      throw new CopyFailure(mapping.source, mapping.destination, synced.length, error);
    }
    synced.push({ source: mapping.source, destination: mapping.destination, rewritten: entry.rewritten });
  }

  return {
    report: {
      total: plan.entries.length,
      missing: 0,
      skipped,
      copied: synced.length
    },
    synced
  };
}

export function syncMappings(mappings: FileMapping[], options: SyncOptions): SyncResult {
  return applySyncPlan(computeSyncPlan(mappings, options));
}
