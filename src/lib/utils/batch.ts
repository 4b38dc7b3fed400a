import pLimit from 'p-limit';
import { logError } from './errors';

export interface BatchOptions<T, R> {
  concurrency?: number;
  onProgress?: (completed: number, total: number, result: R) => void;
  onError?: (error: Error, item: T) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Process items with concurrency control.
 * Results keep the order of their inputs; items whose processor fails are left out.
 */
export async function processBatch<T, R>(
  items: T[],
  processor: (item: T) => Promise<R>,
  options: BatchOptions<T, R> = {}
): Promise<R[]> {
  const { concurrency = 1, onProgress, onError } = options;

  const limit = pLimit(Math.max(1, concurrency));
  const total = items.length;
  let completed = 0;

  const settled = await Promise.allSettled(
    items.map((item) =>
      limit(async () => {
        let result: R;
        try {
          result = await processor(item);
        } catch (error) {
          completed++;
          if (onError) {
            onError(toError(error), item);
          }
          throw error;
        }

        completed++;
        // A failing progress callback must not discard a processed result
        try {
          onProgress?.(completed, total, result);
        } catch (error) {
          logError(toError(error), { stage: 'onProgress', completed, total });
        }
        return result;
      })
    )
  );

  const results: R[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'fulfilled') {
      results.push(outcome.value);
    }
  }

  return results;
}
