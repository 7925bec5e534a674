import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { TrackedFileEnumerator } from '../src/types';

export async function makeTempDir(prefix = 'downstream-sync-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const filePath = path.join(root, relative);
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, content);
  }
}

export class FixtureEnumerator implements TrackedFileEnumerator {
  readonly requested: string[] = [];

  constructor(private readonly files: Record<string, string[]>) {}

  listTrackedFiles(pathspec: string): string[] {
    this.requested.push(pathspec);
    return this.files[pathspec] ?? [];
  }
}
