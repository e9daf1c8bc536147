import { Command } from 'commander';
import chalk from 'chalk';
import { dedupeCommand } from './commands/dedupe.js';
import { loadConfig, createConsoleReporter } from './utils/index.js';

export const VERSION = '1.0.0';

interface CliOptions {
  dryRun?: boolean;
}

export function createProgram(cwd: () => string = () => process.cwd()): Command {
  const program = new Command();

  program
    .name('dedupe-copies')
    .description('Remove "copy" duplicates (file (1).txt, file copy.txt, ...) from the current directory')
    .version(VERSION)
    .option('--dry-run', 'show what would be deleted without deleting anything')
    .allowUnknownOption()
    .allowExcessArguments(true)
    .addHelpText('after', '\n--help and --version print their text and exit without scanning.')
    .action(async (options: CliOptions, command: Command) => {
      const config = await loadConfig();
      const reporter = createConsoleReporter({ verbose: config.verbose });
      // Operands after "--" are not parsed as options but still count.
      const dryRun = options.dryRun === true || command.args.includes('--dry-run');

      if (dryRun) {
        reporter.line('Running in DRY RUN mode - no files will be deleted', 'notice');
        reporter.line();
      }

      await dedupeCommand({
        targetDirectory: cwd(),
        dryRun,
        ignoredPaths: config.ignoredPaths,
        minSize: config.minSize,
        reporter,
      });
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  }
}
