import { readdir, stat, unlink } from 'fs/promises';
import { join } from 'path';
import type { DirectoryEntry, EntryMetadata, RemoveResult } from '../types.js';

export class DirectoryReadError extends Error {
  constructor(
    public directory: string,
    cause: unknown
  ) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'DirectoryReadError';
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function decodeName(raw: Buffer): string | undefined {
  try {
    return utf8.decode(raw);
  } catch {
    return undefined;
  }
}

export async function readMetadata(path: string): Promise<EntryMetadata> {
  const stats = await stat(path, { bigint: true });
  // Filesystems without birth time report 0.
  const hasBirthtime = stats.birthtimeNs > 0n;
  return {
    isFile: stats.isFile(),
    size: Number(stats.size),
    created: hasBirthtime ? stats.birthtime : undefined,
    createdNs: hasBirthtime ? stats.birthtimeNs : undefined,
    modified: stats.mtime,
    modifiedNs: stats.mtimeNs,
  };
}

/**
 * List the immediate entries of one directory, sorted by raw name.
 * Failing to read the directory itself throws a DirectoryReadError;
 * problems with single entries are reported on the entry instead.
 */
export async function listDirectory(directory: string): Promise<DirectoryEntry[]> {
  let names: Buffer[];
  try {
    names = await readdir(directory, { encoding: 'buffer' });
  } catch (error) {
    throw new DirectoryReadError(directory, error);
  }

  names.sort(Buffer.compare);

  const entries: DirectoryEntry[] = [];
  for (const raw of names) {
    const name = decodeName(raw);
    if (name === undefined) {
      entries.push({ path: join(directory, raw.toString('utf-8')) });
      continue;
    }

    const path = join(directory, name);
    try {
      entries.push({ path, name, metadata: await readMetadata(path) });
    } catch (error) {
      entries.push({ path, name, error: errorMessage(error) });
    }
  }

  return entries;
}

export async function removeFile(path: string): Promise<RemoveResult> {
  try {
    await unlink(path);
    return { success: true };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}
