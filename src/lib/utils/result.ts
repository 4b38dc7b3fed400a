import { getErrorMessage } from './errors';

export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Run a fallible async step and capture its failure as a value
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error: getErrorMessage(error) };
  }
}
