/**
 * Deadline handling for the single suspending call of a compaction.
 */

import { CompactionAbortedError, SummaryTimeoutError } from "../core/errors.js";

/** Largest delay `setTimeout` honors; longer delays fire immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Runs `fn` with a signal that aborts when `timeoutMs` elapses or when
 * `parent` aborts, whichever comes first. The returned promise settles as
 * soon as either happens, even if `fn` ignores its signal. Deadlines beyond
 * `MAX_TIMEOUT_MS` are clamped to it.
 *
 * @throws SummaryTimeoutError when the deadline passes
 * @throws CompactionAbortedError when `parent` aborts
 *
 * @example
 * ```typescript
 * const text = await withDeadline((signal) => service.generate({ ...request, signal }), 5000);
 * ```
 */
export function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(new CompactionAbortedError({ cause: parent.reason }));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      parent?.removeEventListener("abort", onParentAbort);
      settle();
    };

    const onParentAbort = () => {
      const error = new CompactionAbortedError({ cause: parent?.reason });
      controller.abort(error);
      finish(() => reject(error));
    };

    const timeoutId = setTimeout(
      () => {
        const error = new SummaryTimeoutError(timeoutMs);
        controller.abort(error);
        finish(() => reject(error));
      },
      Math.min(timeoutMs, MAX_TIMEOUT_MS),
    );

    parent?.addEventListener("abort", onParentAbort, { once: true });

    fn(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error)),
    );
  });
}
