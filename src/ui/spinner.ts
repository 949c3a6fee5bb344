import ora from 'ora';

/** Spinner on stderr while `fn` runs; output written by `fn` is not interleaved. */
export async function withSpinner<T>(text: string, fn: () => Promise<T>): Promise<T> {
  const spinner = ora({ text, stream: process.stderr }).start();
  try {
    const result = await fn();
    spinner.succeed();
    return result;
  } catch (err) {
    spinner.fail();
    throw err;
  }
}
