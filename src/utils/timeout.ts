import { TimeoutError } from '../protocol/errors';

/**
 * Races `task` against a deadline. The timer is cleared as soon as either
 * side settles, so a finished task leaves nothing scheduled.
 */
export function withTimeout<T>(task: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  return Promise.race([task, deadline]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
