import * as fs from 'fs-extra';
import { FileMapping } from './types';
import { MissingDestinationError } from './errors';

function isRegularFile(filePath: string): boolean {
  return fs.pathExistsSync(filePath) && fs.statSync(filePath).isFile();
}

export function findMissingDestinations(mappings: FileMapping[]): string[] {
  return mappings
    .map(mapping => mapping.destination)
    .filter(destination => !isRegularFile(destination));
}

/**
 * Every destination has to be present before anything is copied. The
 * downstream tree is never populated with new files.
 */
export function assertDestinationsExist(mappings: FileMapping[]): void {
  const missing = findMissingDestinations(mappings);
  if (missing.length > 0) {
    throw new MissingDestinationError(missing);
  }
}
