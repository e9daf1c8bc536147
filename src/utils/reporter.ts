import chalk from 'chalk';

export type Tone = 'plain' | 'heading' | 'notice' | 'success' | 'caution' | 'warn' | 'error' | 'debug';

export interface Reporter {
  line(text?: string, tone?: Tone): void;
  debug(tag: string, text: string): void;
}

const STYLES: Record<Tone, (text: string) => string> = {
  plain: (text) => text,
  heading: (text) => chalk.bold(text),
  notice: (text) => chalk.cyan(text),
  success: (text) => chalk.green(text),
  caution: (text) => chalk.yellow(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
  debug: (text) => chalk.dim(text),
};

/**
 * Console output for the CLI. Warnings and errors go to stderr,
 * debug lines only when verbose.
 */
export function createConsoleReporter(options: { verbose?: boolean } = {}): Reporter {
  return {
    line(text = '', tone = 'plain') {
      const styled = text ? STYLES[tone](text) : text;
      if (tone === 'warn' || tone === 'error') {
        console.error(styled);
      } else {
        console.log(styled);
      }
    },
    debug(tag, text) {
      if (options.verbose) {
        console.log(STYLES.debug(`[${tag}] ${text}`));
      }
    },
  };
}
