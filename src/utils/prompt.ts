import input from '@inquirer/input';

export type Prompt = (message: string) => Promise<string>;

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

// Inquirer rejects with ExitPromptError when stdin closes (Ctrl-D, < /dev/null).
function isClosedInput(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

/**
 * Read one line. Closed input reads as an empty answer.
 */
export const askLine: Prompt = async (message) => {
  try {
    return await input({ message });
  } catch (error) {
    if (isClosedInput(error)) {
      return '';
    }
    throw error;
  }
};
