import { TranslationTimeoutError } from '../errors.js';

/**
 * Race a task against a timer. The timer is always cleared, and a late
 * settlement of the task after the timeout is ignored. When a controller is
 * given it is aborted on timeout so the task can stop its own work.
 */
export function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
  label = 'Operation',
  controller?: AbortController
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller?.abort(new TranslationTimeoutError(timeoutMs, label));
      reject(new TranslationTimeoutError(timeoutMs, label));
    }, timeoutMs);

    task.then(
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

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
