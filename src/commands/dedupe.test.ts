import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readdir } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import input from '@inquirer/input';
import { dedupeCommand, RULE } from './dedupe.js';
import { DirectoryReadError } from '../utils/fs.js';
import type { Reporter, Tone } from '../utils/reporter.js';
import type { DirectoryEntry } from '../types.js';

vi.mock('@inquirer/input', () => ({
  default: vi.fn(),
}));

interface RecordedLine {
  text: string;
  tone: Tone;
}

function createRecordingReporter(): Reporter & { lines: RecordedLine[]; texts(): string[] } {
  const lines: RecordedLine[] = [];
  return {
    lines,
    line(text = '', tone = 'plain') {
      lines.push({ text, tone });
    },
    debug() {},
    texts() {
      return lines.map((l) => l.text);
    },
  };
}

describe('dedupeCommand', () => {
  let testDir: string;

  // Files live on disk, timestamps come from the fake listing so the
  // keeper does not depend on the filesystem's birth time support.
  async function addFile(name: string, size: number, time: string): Promise<DirectoryEntry> {
    const path = join(testDir, name);
    await writeFile(path, 'x'.repeat(size));
    return { path, name, metadata: { isFile: true, size, created: new Date(time), modified: new Date(time) } };
  }

  const listing = (entries: DirectoryEntry[]) => vi.fn(async () => entries);

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'dedupe-copies-command-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should delete the later copy after confirmation', async () => {
    const entries = [
      await addFile('photo (1).jpg', 1000, '2024-03-02T00:00:00Z'),
      await addFile('photo.jpg', 1000, '2024-03-01T00:00:00Z'),
    ];
    const reporter = createRecordingReporter();
    const prompt = vi.fn(async () => 'y');

    const outcome = await dedupeCommand({
      targetDirectory: testDir,
      listDirectory: listing(entries),
      prompt,
      reporter,
    });

    expect(outcome).toEqual({
      state: 'DONE',
      trail: ['SCANNING', 'GROUPING', 'REPORTING', 'AWAITING_CONFIRMATION', 'DELETING', 'DONE'],
      setsFound: 1,
      filesToDelete: 1,
      deleted: 1,
      errors: 0,
      warnings: 0,
    });
    expect(prompt).toHaveBeenCalledWith('Proceed with deletion? (y/N):');
    expect(await readdir(testDir)).toEqual(['photo.jpg']);
    expect(reporter.texts()).toEqual([
      '',
      '--- Duplicate Set ---',
      'Normalized filename: photo.jpg',
      'Size: 1000 bytes',
      `Keeping: ${join(testDir, 'photo.jpg')}`,
      `Will delete: ${join(testDir, 'photo (1).jpg')}`,
      '',
      RULE,
      'Summary: Found 1 duplicate set(s)',
      'Total files to delete: 1',
      '',
      '',
      'Deleting files...',
      `Deleted: ${join(testDir, 'photo (1).jpg')}`,
      '',
      RULE,
      'Deletion complete!',
      'Files deleted: 1',
    ]);
  });

  it('should report and stop without a prompt when there are no duplicates', async () => {
    const entries = [
      await addFile('a.txt', 3, '2024-01-01T00:00:00Z'),
      await addFile('b.txt', 3, '2024-01-01T00:00:00Z'),
    ];
    const reporter = createRecordingReporter();
    const prompt = vi.fn(async () => 'y');

    const outcome = await dedupeCommand({ targetDirectory: testDir, listDirectory: listing(entries), prompt, reporter });

    expect(outcome.state).toBe('DONE');
    expect(outcome.trail).toEqual(['SCANNING', 'GROUPING', 'DONE']);
    expect(prompt).not.toHaveBeenCalled();
    expect(reporter.texts()).toEqual(['', 'No duplicates found!']);
  });

  it('should leave the directory untouched in dry-run mode', async () => {
    await writeFile(join(testDir, 'notes.txt'), 'same');
    await writeFile(join(testDir, 'notes copy.txt'), 'same');
    await writeFile(join(testDir, 'notes copy 2.txt'), 'same');
    const before = await readdir(testDir);
    const reporter = createRecordingReporter();
    const prompt = vi.fn(async () => 'y');
    const removeFile = vi.fn(async () => ({ success: true }));

    // Real directory listing: which file is kept depends on the filesystem.
    const outcome = await dedupeCommand({ targetDirectory: testDir, dryRun: true, prompt, removeFile, reporter });

    expect(outcome.state).toBe('DRY_RUN_DONE');
    expect(outcome.setsFound).toBe(1);
    expect(outcome.filesToDelete).toBe(2);
    expect(prompt).not.toHaveBeenCalled();
    expect(removeFile).not.toHaveBeenCalled();
    expect(await readdir(testDir)).toEqual(before);
    expect(reporter.texts().filter((t) => t.startsWith('Would delete: '))).toHaveLength(2);
    expect(reporter.texts().slice(-3)).toEqual([
      '',
      '[DRY RUN MODE] No files were deleted.',
      'Run without --dry-run to actually delete files.',
    ]);
  });

  it.each(['n', '', 'no', 'yep'])('should cancel without deleting on answer %j', async (answer) => {
    const entries = [
      await addFile('report.pdf', 10, '2024-01-01T00:00:00Z'),
      await addFile('report - Copy (2).pdf', 10, '2024-01-02T00:00:00Z'),
    ];
    const reporter = createRecordingReporter();
    const removeFile = vi.fn(async () => ({ success: true }));

    const outcome = await dedupeCommand({
      targetDirectory: testDir,
      listDirectory: listing(entries),
      prompt: async () => answer,
      removeFile,
      reporter,
    });

    expect(outcome.state).toBe('CANCELLED');
    expect(outcome.deleted).toBe(0);
    expect(removeFile).not.toHaveBeenCalled();
    expect((await readdir(testDir)).sort()).toEqual(['report - Copy (2).pdf', 'report.pdf']);
    expect(reporter.texts().at(-1)).toBe('Deletion cancelled.');
  });

  it('should cancel when stdin closes before an answer', async () => {
    const entries = [
      await addFile('photo.jpg', 1000, '2024-03-01T00:00:00Z'),
      await addFile('photo (1).jpg', 1000, '2024-03-02T00:00:00Z'),
    ];
    const closed = Object.assign(new Error('User force closed the prompt with 0 null'), { name: 'ExitPromptError' });
    vi.mocked(input).mockRejectedValueOnce(closed);
    const reporter = createRecordingReporter();
    const removeFile = vi.fn(async () => ({ success: true }));

    const outcome = await dedupeCommand({
      targetDirectory: testDir,
      listDirectory: listing(entries),
      removeFile,
      reporter,
    });

    expect(outcome.state).toBe('CANCELLED');
    expect(removeFile).not.toHaveBeenCalled();
    expect((await readdir(testDir)).sort()).toEqual(['photo (1).jpg', 'photo.jpg']);
    expect(reporter.texts().at(-1)).toBe('Deletion cancelled.');
  });

  it('should keep deleting after a failure and count the errors', async () => {
    const entries = [
      await addFile('a.txt', 1, '2024-01-01T00:00:00Z'),
      await addFile('a (1).txt', 1, '2024-01-02T00:00:00Z'),
      await addFile('a (2).txt', 1, '2024-01-03T00:00:00Z'),
    ];
    const reporter = createRecordingReporter();
    const removeFile = vi
      .fn<(path: string) => Promise<{ success: boolean; error?: string }>>()
      .mockResolvedValueOnce({ success: false, error: 'EACCES: permission denied' })
      .mockResolvedValueOnce({ success: true });

    const outcome = await dedupeCommand({
      targetDirectory: testDir,
      listDirectory: listing(entries),
      prompt: async () => 'YES',
      removeFile,
      reporter,
    });

    expect(removeFile).toHaveBeenCalledTimes(2);
    expect(removeFile).toHaveBeenNthCalledWith(1, join(testDir, 'a (1).txt'));
    expect(removeFile).toHaveBeenNthCalledWith(2, join(testDir, 'a (2).txt'));
    expect(outcome).toMatchObject({ state: 'DONE', deleted: 1, errors: 1 });
    expect(reporter.lines).toContainEqual({
      text: `Error deleting '${join(testDir, 'a (1).txt')}': EACCES: permission denied`,
      tone: 'error',
    });
    expect(reporter.texts().slice(-2)).toEqual(['Files deleted: 1', 'Errors encountered: 1']);
  });

  it('should report skipped entries as warnings and carry on', async () => {
    const entries: DirectoryEntry[] = [
      { path: join(testDir, 'locked.txt'), name: 'locked.txt', error: 'EACCES: permission denied' },
      await addFile('solo.txt', 1, '2024-01-01T00:00:00Z'),
    ];
    const reporter = createRecordingReporter();

    const outcome = await dedupeCommand({ targetDirectory: testDir, listDirectory: listing(entries), reporter });

    expect(outcome.warnings).toBe(1);
    expect(outcome.state).toBe('DONE');
    expect(reporter.lines[0]).toEqual({
      text: `Error reading metadata for '${join(testDir, 'locked.txt')}': EACCES: permission denied`,
      tone: 'warn',
    });
  });

  it('should fail the run when the directory cannot be read', async () => {
    const missing = join(testDir, 'missing');
    const reporter = createRecordingReporter();
    const prompt = vi.fn(async () => 'y');

    const outcome = await dedupeCommand({ targetDirectory: missing, prompt, reporter });

    expect(outcome.state).toBe('FAILED');
    expect(outcome.trail).toEqual(['SCANNING', 'FAILED']);
    expect(prompt).not.toHaveBeenCalled();
    expect(reporter.lines).toHaveLength(1);
    expect(reporter.lines[0]?.tone).toBe('error');
    expect(reporter.lines[0]?.text.startsWith(`Error reading directory '${missing}': ENOENT`)).toBe(true);
  });

  it('should rethrow errors that are not directory read failures', async () => {
    const boom = new Error('lister bug');

    await expect(
      dedupeCommand({
        targetDirectory: testDir,
        listDirectory: async () => {
          throw boom;
        },
        reporter: createRecordingReporter(),
      })
    ).rejects.toBe(boom);
  });

  it('should honour ignored paths and minimum size', async () => {
    const entries = [
      await addFile('big.bin', 50, '2024-01-01T00:00:00Z'),
      await addFile('big (1).bin', 50, '2024-01-02T00:00:00Z'),
      await addFile('small.txt', 2, '2024-01-01T00:00:00Z'),
      await addFile('small (1).txt', 2, '2024-01-02T00:00:00Z'),
    ];
    const reporter = createRecordingReporter();

    const outcome = await dedupeCommand({
      targetDirectory: testDir,
      dryRun: true,
      listDirectory: listing(entries),
      ignoredPaths: ['big (1).bin'],
      minSize: 10,
      reporter,
    });

    expect(outcome.state).toBe('DONE');
    expect(outcome.setsFound).toBe(0);
  });

  it('should surface a lister DirectoryReadError from an injected lister', async () => {
    const reporter = createRecordingReporter();

    const outcome = await dedupeCommand({
      targetDirectory: '/somewhere',
      listDirectory: async (dir) => {
        throw new DirectoryReadError(dir, new Error('EACCES: permission denied'));
      },
      reporter,
    });

    expect(outcome.state).toBe('FAILED');
    expect(reporter.texts()).toEqual(["Error reading directory '/somewhere': EACCES: permission denied"]);
  });
});
