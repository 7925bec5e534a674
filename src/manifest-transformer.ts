import * as path from 'path';
import { TransformRule } from './types';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const PATH_FIELD = /\bpath\s*=/;
const VERSION_FIELD = /\bversion\s*=\s*"([^"]*)"/;

export function isManifest(source: string, rule: TransformRule): boolean {
  return path.posix.basename(source) === rule.fileName;
}

/**
 * Rewrites `dep = { path = "../dep", version = "1.2.3" }` into `dep = "1.2.3"`
 * for the rule's dependency. In-tree path dependencies break once the
 * manifest leaves the source repository. Everything else passes through.
 */
export function transformManifest(content: string, rule: TransformRule): string {
  const declaration = new RegExp(`^${escapeRegExp(rule.dependency)}\\s*=`);

  return content
    .split('\n')
    .map(line => {
      const carriageReturn = line.endsWith('\r') ? '\r' : '';
      const body = carriageReturn ? line.slice(0, -1) : line;

      if (!declaration.test(body) || !PATH_FIELD.test(body)) {
        return line;
      }
      const version = VERSION_FIELD.exec(body);
      if (!version) {
        return line;
      }
      return `${rule.dependency} = "${version[1]}"${carriageReturn}`;
    })
    .join('\n');
}
