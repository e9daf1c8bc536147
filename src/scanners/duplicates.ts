import type { DuplicateSet, FileRecord } from '../types.js';
import { normalizeFilename } from './normalize.js';

function groupBy<K, T>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

export function groupByNormalizedName(records: readonly FileRecord[]): Map<string, FileRecord[]> {
  return groupBy(records, (record) => normalizeFilename(record.name));
}

export function groupBySize(records: readonly FileRecord[]): Map<number, FileRecord[]> {
  return groupBy(records, (record) => record.size);
}

/**
 * Pick the file to keep: the earliest timestamp. On a tie the member that
 * comes first in the set wins, so resolving the same set twice agrees.
 */
export function selectKeeper(files: readonly FileRecord[]): FileRecord {
  const [first, ...rest] = files;
  if (!first) {
    throw new Error('Cannot select a keeper from an empty set');
  }

  let keeper = first;
  for (const file of rest) {
    if (file.timestampNs < keeper.timestampNs) {
      keeper = file;
    }
  }
  return keeper;
}

export function resolveDuplicateSet(key: string, size: number, files: readonly FileRecord[]): DuplicateSet {
  const keeper = selectKeeper(files);
  return {
    key,
    size,
    files,
    keeper,
    toDelete: files.filter((file) => file !== keeper),
  };
}

/**
 * Group records by normalized name, then by exact size. Only groups with
 * more than one member on both levels become duplicate sets.
 */
export function findDuplicateSets(records: readonly FileRecord[]): DuplicateSet[] {
  const sets: DuplicateSet[] = [];

  for (const [key, nameGroup] of groupByNormalizedName(records)) {
    if (nameGroup.length < 2) continue;

    for (const [size, sizeGroup] of groupBySize(nameGroup)) {
      if (sizeGroup.length < 2) continue;
      sets.push(resolveDuplicateSet(key, size, sizeGroup));
    }
  }

  return sets;
}

export function countFilesToDelete(sets: readonly DuplicateSet[]): number {
  return sets.reduce((sum, set) => sum + set.files.length - 1, 0);
}
