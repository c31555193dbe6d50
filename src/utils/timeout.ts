/**
 * Timeout guard for collaborator calls.
 * Every suspension point in an evaluation goes through here so that a
 * stalled service degrades to a fallback instead of blocking.
 */

import { TimeoutError } from '../errors.js';

export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: () => Promise<T>
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([task(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
