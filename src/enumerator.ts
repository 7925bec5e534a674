import { execFileSync } from 'child_process';
import { globSync } from 'glob';
import { Configuration, TrackedFileEnumerator, TrackedFiles } from './types';

export class GitTrackedFileEnumerator implements TrackedFileEnumerator {
  constructor(private readonly repositoryRoot: string) {}

  listTrackedFiles(pathspec: string): string[] {
    // -z: paths come back unquoted, NUL-terminated
    const output = execFileSync('git', ['ls-files', '-z', '--', pathspec], {
      cwd: this.repositoryRoot,
      encoding: 'utf8'
    });
    return output.split('\0').filter(entry => entry.length > 0);
  }
}

/**
 * Lists every regular file below a directory, for source trees that are not
 * git checkouts.
 */
export class GlobTrackedFileEnumerator implements TrackedFileEnumerator {
  constructor(private readonly repositoryRoot: string) {}

  listTrackedFiles(pathspec: string): string[] {
    const pattern = `${pathspec.replace(/\/+$/, '')}/**/*`;
    return globSync(pattern, {
      cwd: this.repositoryRoot,
      nodir: true,
      dot: true,
      posix: true
    }).sort();
  }
}

function withoutExcluded(files: string[], exclude: string[]): string[] {
  return files.filter(file => !exclude.some(fragment => file.includes(fragment)));
}

export function collectTrackedFiles(
  enumerator: TrackedFileEnumerator,
  config: Configuration
): TrackedFiles {
  const { headers, schedulers } = config;
  return {
    headers: withoutExcluded(enumerator.listTrackedFiles(headers.dir), headers.exclude),
    broad: withoutExcluded(enumerator.listTrackedFiles(schedulers.broadGroup), schedulers.exclude),
    narrow: withoutExcluded(enumerator.listTrackedFiles(schedulers.narrowGroup), schedulers.exclude)
  };
}
