import * as path from 'path';
import { FileMapping, MappingCategory, TrackedFiles } from './types';

export interface PathMapperOptions {
  downstreamRoot: string;
  allowList: string[];
}

function dropLeadingSegment(source: string): string {
  const slash = source.indexOf('/');
  return slash === -1 ? source : source.slice(slash + 1);
}

/**
 * Computes where a source file lands in the downstream tree, or `null` when
 * the file is not synced at all.
 *
 * Headers keep their path. Scheduler sources lose their group directory, so
 * `kernel-examples/scx_simple.bpf.c` lands at `<root>/scx_simple.bpf.c`.
 * Narrow scheduler sources are `<group>/<component>/<rest>` and only
 * components on the allow-list are mapped.
 */
export function mapSourcePath(
  source: string,
  category: MappingCategory,
  options: PathMapperOptions
): FileMapping | null {
  switch (category) {
    case 'header':
      return { category, source, destination: path.join(options.downstreamRoot, source) };
    case 'scheduler-broad':
      return {
        category,
        source,
        destination: path.join(options.downstreamRoot, dropLeadingSegment(source))
      };
    case 'scheduler-narrow': {
      const segments = source.split('/');
      if (segments.length < 3 || !options.allowList.includes(segments[1])) {
        return null;
      }
      return {
        category,
        source,
        destination: path.join(options.downstreamRoot, ...segments.slice(1))
      };
    }
  }
}

export function buildMappings(tracked: TrackedFiles, options: PathMapperOptions): FileMapping[] {
  const candidates: Array<[string, MappingCategory]> = [
    ...tracked.headers.map((file): [string, MappingCategory] => [file, 'header']),
    ...tracked.broad.map((file): [string, MappingCategory] => [file, 'scheduler-broad']),
    ...tracked.narrow.map((file): [string, MappingCategory] => [file, 'scheduler-narrow'])
  ];

  const mappings: FileMapping[] = [];
  for (const [source, category] of candidates) {
    const mapping = mapSourcePath(source, category, options);
    if (mapping) {
      mappings.push(mapping);
    }
  }
  return mappings;
}
