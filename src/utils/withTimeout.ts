import { AppError, TransientStorageError } from './AppError';

/**
 * Bounds a storage call. Rejections and timeouts both surface as
 * TransientStorageError so callers have a single failure to recover from.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransientStorageError(`${label} timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([operation, timeout]);
  } catch (error) {
    // Domain errors (seat taken, not found) pass through untouched
    if (error instanceof AppError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new TransientStorageError(`${label} failed: ${message}`);
  } finally {
    clearTimeout(timer);
  }
}
