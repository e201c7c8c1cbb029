import { errorMessage } from './errors.js';
import type { ProbeOutcome } from './types.js';

export type DeadlineOperation<D> = (signal: AbortSignal) => Promise<ProbeOutcome<D>>;

export function assertTimeout(name: string, timeoutMs: number): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new RangeError(`${name} must be a positive number of milliseconds, received ${timeoutMs}`);
  }
}

/**
 * Runs `operation` with a hard deadline and never rejects.
 *
 * Once the deadline passes the returned promise settles with a timeout outcome and
 * the signal handed to the operation is aborted. The operation itself is not
 * awaited any further: a late result is dropped and a late rejection is swallowed
 * here so it cannot surface as an unhandled rejection.
 */
export function runWithDeadline<D>(operation: DeadlineOperation<D>, timeoutMs: number): Promise<ProbeOutcome<D>> {
  const controller = new AbortController();

  let running: Promise<ProbeOutcome<D>>;
  try {
    running = operation(controller.signal);
  } catch (e) {
    return Promise.resolve({ status: 'error', message: errorMessage(e) });
  }

  return new Promise<ProbeOutcome<D>>((resolve) => {
    let settled = false;
    const timer = setTimeout(() => {
      settled = true;
      controller.abort();
      resolve({ status: 'timeout' });
    }, timeoutMs);

    void running
      .then(
        (outcome): ProbeOutcome<D> => outcome,
        (e: unknown): ProbeOutcome<D> => ({ status: 'error', message: errorMessage(e) }),
      )
      .then((outcome) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(outcome);
      });
  });
}
