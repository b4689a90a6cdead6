import ora from 'ora';
import type { Ora } from 'ora';

export function createSpinner(text: string): Ora {
  // Commands run between spinners write their own output; keep stdin untouched.
  return ora({ text, spinner: 'dots', discardStdin: false });
}

/**
 * Show a spinner while `fn` runs. The spinner is stopped before the result or
 * error is handed back so follow-up log lines start on a clean line.
 */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  doneText?: (result: T) => string,
): Promise<T> {
  const spinner = createSpinner(text).start();
  try {
    const result = await fn();
    spinner.succeed(doneText ? doneText(result) : undefined);
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
