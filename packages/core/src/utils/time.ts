import { OperationTimeoutError } from '../types/errors';

export function now(): number {
  return Date.now();
}

/**
 * Race `work` against a timer. The timer is always cleared.
 * The underlying operation is not cancelled; its late result is dropped.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  target: string,
  operation: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(target, operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
