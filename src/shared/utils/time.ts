/**
 * Timing and size formatting utilities
 */

/**
 * Error thrown when a bounded wait runs out
 */
export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number, what: string = 'Operation') {
    super(`${what} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a promise against a timer.
 * The timer is always cleared, so a settled promise leaves nothing pending.
 * @param promise Work to wait for
 * @param timeoutMs Upper bound in milliseconds
 * @param what Label used in the timeout message
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, what?: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(timeoutMs, what)), timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Collapse bursts of calls into one call after `waitMs` of quiet
 */
export function debounce(fn: () => void, waitMs: number): { (): void; cancel(): void } {
  let timer: NodeJS.Timeout | null = null;

  const debounced = () => {
    if (timer) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = null;
      fn();
    }, waitMs);
  };

  debounced.cancel = () => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  };

  return debounced;
}

/**
 * Format a byte count for display
 * @returns Formatted string like "512 B", "1.5 KB" or "63.2 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 0) bytes = 0;

  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;

  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }

  if (unit === 0) return `${value} B`;
  return `${value.toFixed(1)} ${units[unit]}`;
}
