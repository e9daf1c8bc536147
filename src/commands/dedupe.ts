import type { DedupeOutcome, DuplicateSet, RemoveResult, RunState } from '../types.js';
import { scanDirectory, countFilesToDelete, type DirectoryLister } from '../scanners/index.js';
import {
  listDirectory,
  removeFile,
  askLine,
  isAffirmative,
  createConsoleReporter,
  DirectoryReadError,
  type Prompt,
  type Reporter,
} from '../utils/index.js';

export const RULE = '='.repeat(32);

export interface DedupeCommandOptions {
  targetDirectory: string;
  dryRun?: boolean;
  ignoredPaths?: string[];
  minSize?: number;
  listDirectory?: DirectoryLister;
  prompt?: Prompt;
  removeFile?: (path: string) => Promise<RemoveResult>;
  reporter?: Reporter;
}

function reportSet(reporter: Reporter, set: DuplicateSet, dryRun: boolean): void {
  reporter.line();
  reporter.line('--- Duplicate Set ---', 'heading');
  reporter.line(`Normalized filename: ${set.key}`);
  reporter.line(`Size: ${set.size} bytes`);
  reporter.line(`Keeping: ${set.keeper.path}`, 'success');

  const verb = dryRun ? 'Would delete' : 'Will delete';
  for (const file of set.toDelete) {
    reporter.line(`${verb}: ${file.path}`, 'caution');
  }
}

/**
 * Find copies in one directory, report them and, unless this is a dry run
 * or the user declines, delete everything but the earliest file per set.
 */
export async function dedupeCommand(options: DedupeCommandOptions): Promise<DedupeOutcome> {
  const dryRun = options.dryRun ?? false;
  const reporter = options.reporter ?? createConsoleReporter();
  const list = options.listDirectory ?? listDirectory;
  const prompt = options.prompt ?? askLine;
  const remove = options.removeFile ?? removeFile;

  const outcome: DedupeOutcome = {
    state: 'SCANNING',
    trail: ['SCANNING'],
    setsFound: 0,
    filesToDelete: 0,
    deleted: 0,
    errors: 0,
    warnings: 0,
  };

  const enter = (state: RunState): DedupeOutcome => {
    outcome.state = state;
    outcome.trail.push(state);
    reporter.debug('Dedupe', `-> ${state}`);
    return outcome;
  };

  let sets: DuplicateSet[];
  try {
    const scan = await scanDirectory(options.targetDirectory, list, {
      ignoredPaths: options.ignoredPaths,
      minSize: options.minSize,
      onSkip: (entry, reason) => reporter.debug('Collector', `Skipping ${entry.path}: ${reason}`),
    });
    for (const warning of scan.warnings) {
      reporter.line(warning, 'warn');
    }
    outcome.warnings = scan.warnings.length;
    reporter.debug('Collector', `${scan.records.length} files collected from ${scan.directory}`);
    sets = scan.duplicateSets;
  } catch (error) {
    if (error instanceof DirectoryReadError) {
      reporter.line(`Error reading directory '${error.directory}': ${error.message}`, 'error');
      return enter('FAILED');
    }
    throw error;
  }

  enter('GROUPING');
  if (sets.length === 0) {
    reporter.line();
    reporter.line('No duplicates found!', 'success');
    return enter('DONE');
  }

  enter('REPORTING');
  for (const set of sets) {
    reportSet(reporter, set, dryRun);
  }
  outcome.setsFound = sets.length;
  outcome.filesToDelete = countFilesToDelete(sets);

  reporter.line();
  reporter.line(RULE);
  reporter.line(`Summary: Found ${outcome.setsFound} duplicate set(s)`, 'heading');
  reporter.line(`Total files to delete: ${outcome.filesToDelete}`, 'heading');

  if (dryRun) {
    reporter.line();
    reporter.line('[DRY RUN MODE] No files were deleted.', 'notice');
    reporter.line('Run without --dry-run to actually delete files.', 'notice');
    return enter('DRY_RUN_DONE');
  }

  enter('AWAITING_CONFIRMATION');
  reporter.line();
  const answer = await prompt('Proceed with deletion? (y/N):');
  if (!isAffirmative(answer)) {
    reporter.line('Deletion cancelled.', 'notice');
    return enter('CANCELLED');
  }

  enter('DELETING');
  reporter.line();
  reporter.line('Deleting files...', 'notice');

  for (const set of sets) {
    for (const file of set.toDelete) {
      const result = await remove(file.path);
      if (result.success) {
        reporter.line(`Deleted: ${file.path}`);
        outcome.deleted++;
      } else {
        reporter.line(`Error deleting '${file.path}': ${result.error ?? 'unknown error'}`, 'error');
        outcome.errors++;
      }
    }
  }

  reporter.line();
  reporter.line(RULE);
  reporter.line('Deletion complete!', 'success');
  reporter.line(`Files deleted: ${outcome.deleted}`);
  if (outcome.errors > 0) {
    reporter.line(`Errors encountered: ${outcome.errors}`, 'caution');
  }

  return enter('DONE');
}
