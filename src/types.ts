export type MappingCategory = 'header' | 'scheduler-broad' | 'scheduler-narrow';

export interface FileMapping {
  category: MappingCategory;
  source: string;
  destination: string;
}

export interface TransformRule {
  fileName: string;
  dependency: string;
}

export interface SyncReport {
  total: number;
  missing: number;
  skipped: number;
  copied: number;
}

export interface SyncedFile {
  source: string;
  destination: string;
  rewritten: boolean;
}

export interface TrackedFiles {
  headers: string[];
  broad: string[];
  narrow: string[];
}

export interface TrackedFileEnumerator {
  listTrackedFiles(pathspec: string): string[];
}

export interface BuildTargetDeclaration {
  name: string;
  output: string;
  command: string[];
  depends?: string[];
}

export interface BuildTarget {
  name: string;
  output: string;
  command: string[];
  depends: string[];
  buildAlwaysStale: boolean;
  buildByDefault: boolean;
}

export interface ChainState {
  tail: BuildTarget | null;
  targets: BuildTarget[];
}

export interface AggregateTargetSpec {
  name: string;
  output: string;
  command: string[];
}

export interface BuildGraph {
  targets: BuildTarget[];
  aggregate: BuildTarget;
}

export interface HeaderSettings {
  dir: string;
  exclude: string[];
}

export interface SchedulerSettings {
  broadGroup: string;
  narrowGroup: string;
  allowList: string[];
  exclude: string[];
}

export interface ChainSettings {
  targets: BuildTargetDeclaration[];
  aggregate: AggregateTargetSpec;
}

export interface Configuration {
  version: string;
  downstreamSubdir: string;
  headers: HeaderSettings;
  schedulers: SchedulerSettings;
  manifest: TransformRule;
  chain: ChainSettings;
}
