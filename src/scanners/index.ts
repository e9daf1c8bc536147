import type { CollectOptions, DirectoryEntry, ScanResult } from '../types.js';
import { collectFileRecords } from './collector.js';
import { findDuplicateSets } from './duplicates.js';

export type DirectoryLister = (directory: string) => Promise<DirectoryEntry[]>;

/**
 * Collect one directory and group its files into duplicate sets.
 * Errors from the lister itself propagate: without a listing there is
 * nothing to group.
 */
export async function scanDirectory(
  directory: string,
  list: DirectoryLister,
  options: CollectOptions = {}
): Promise<ScanResult> {
  const entries = await list(directory);
  const { records, warnings } = collectFileRecords(entries, options);

  return {
    directory,
    records,
    duplicateSets: findDuplicateSets(records),
    warnings,
  };
}

export { normalizeFilename, splitFilename, stripCopySuffix, COPY_SUFFIX_PATTERNS } from './normalize.js';
export { collectFileRecords, resolveTimestamp, type ResolvedTimestamp } from './collector.js';
export {
  findDuplicateSets,
  groupByNormalizedName,
  groupBySize,
  selectKeeper,
  resolveDuplicateSet,
  countFilesToDelete,
} from './duplicates.js';
