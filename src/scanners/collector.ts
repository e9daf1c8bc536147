import { basename } from 'path';
import type { CollectOptions, CollectResult, DirectoryEntry, EntryMetadata, FileRecord, TimestampSource } from '../types.js';

export interface ResolvedTimestamp {
  timestamp: Date;
  timestampNs: bigint;
  source: TimestampSource;
}

function toNanoseconds(date: Date, precise?: bigint): bigint {
  return precise ?? BigInt(date.getTime()) * 1_000_000n;
}

/**
 * Best-effort file age: creation time when the platform reports one,
 * otherwise the last modification time. Returns null when neither exists.
 */
export function resolveTimestamp(metadata: EntryMetadata): ResolvedTimestamp | null {
  if (metadata.created) {
    return { timestamp: metadata.created, timestampNs: toNanoseconds(metadata.created, metadata.createdNs), source: 'created' };
  }
  if (metadata.modified) {
    return { timestamp: metadata.modified, timestampNs: toNanoseconds(metadata.modified, metadata.modifiedNs), source: 'modified' };
  }
  return null;
}

function isIgnored(entry: DirectoryEntry, name: string, ignoredPaths: Set<string>): boolean {
  return ignoredPaths.has(name) || ignoredPaths.has(entry.path) || ignoredPaths.has(basename(entry.path));
}

/**
 * Turn raw directory entries into file records. Entries that cannot be used
 * are skipped with a warning and never stop the scan.
 */
export function collectFileRecords(entries: DirectoryEntry[], options: CollectOptions = {}): CollectResult {
  const records: FileRecord[] = [];
  const warnings: string[] = [];
  const ignoredPaths = new Set(options.ignoredPaths ?? []);
  const minSize = options.minSize ?? 0;

  for (const entry of entries) {
    if (entry.name === undefined) {
      warnings.push(`Warning: Could not decode filename for '${entry.path}'`);
      continue;
    }

    if (entry.error !== undefined || !entry.metadata) {
      warnings.push(`Error reading metadata for '${entry.path}': ${entry.error ?? 'no metadata'}`);
      continue;
    }

    const { metadata } = entry;
    if (!metadata.isFile) {
      options.onSkip?.(entry, 'not a regular file');
      continue;
    }

    const resolved = resolveTimestamp(metadata);
    if (!resolved) {
      warnings.push(`Warning: Could not get creation or modified time for '${entry.path}'`);
      continue;
    }

    if (isIgnored(entry, entry.name, ignoredPaths)) {
      options.onSkip?.(entry, 'ignored by config');
      continue;
    }

    if (metadata.size < minSize) {
      options.onSkip?.(entry, `smaller than ${minSize} bytes`);
      continue;
    }

    records.push({
      path: entry.path,
      name: entry.name,
      size: metadata.size,
      timestamp: resolved.timestamp,
      timestampNs: resolved.timestampNs,
      timestampSource: resolved.source,
    });
  }

  return { records, warnings };
}
