// This module bounds async work with a deadline and aborts the work's signal when the deadline passes.

import { setTimeout as sleep } from 'node:timers/promises';
import { AppError } from './errors.js';

// This helper races one abortable task against a timer and always releases the timer on exit.
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const taskController = new AbortController();
  const timerController = new AbortController();

  const timer = sleep(timeoutMs, undefined, { signal: timerController.signal }).then(
    () => {
      taskController.abort();
      throw new AppError(504, 'timeout', `${label} timed out after ${timeoutMs} ms.`);
    },
    (error: unknown) => {
      // Cancelled timers stay pending so they never win the race.
      if (timerController.signal.aborted) {
        return new Promise<never>(() => undefined);
      }
      throw error;
    }
  );

  try {
    return await Promise.race([task(taskController.signal), timer]);
  } finally {
    timerController.abort();
  }
}
