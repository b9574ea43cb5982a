export type ErrorKind = 'input_rejected' | 'unavailable' | 'backend_failure' | 'timeout';

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; kind: ErrorKind; error: string };

export type Failure = Extract<Result<never>, { ok: false }>;

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = (kind: ErrorKind, error: string): Failure => ({
  ok: false,
  kind,
  error: error.trim() || kind,
});

export const toErrorMessage = (err: unknown): string => {
  if (err instanceof Error && err.message.trim()) {
    return err.message;
  }
  return String(err);
};

type SettleOptions = {
  label: string;
  timeoutMs: number;
  signal?: AbortSignal;
};

/**
 * Runs one backend call under a deadline.
 *
 * The task receives a signal that aborts on timeout or when the caller's signal aborts.
 * Thrown errors and rejected promises become `backend_failure`; the deadline and a caller
 * abort become `timeout`, without waiting for the task to notice.
 */
export async function settle<T>(
  options: SettleOptions,
  task: (signal: AbortSignal) => Promise<Result<T>>,
): Promise<Result<T>> {
  const controller = new AbortController();
  const parent = options.signal;
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<Result<T>>((resolve) => {
    if (parent?.aborted) {
      controller.abort(parent.reason);
      resolve(fail('timeout', `${options.label} cancelled`));
      return;
    }

    onParentAbort = () => {
      controller.abort(parent?.reason);
      resolve(fail('timeout', `${options.label} cancelled`));
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });

    timer = setTimeout(() => {
      controller.abort(new Error(`${options.label} timed out`));
      resolve(fail('timeout', `${options.label} timed out after ${options.timeoutMs} ms`));
    }, options.timeoutMs);
  });

  const attempt = controller.signal.aborted
    ? deadline
    : (async (): Promise<Result<T>> => {
        try {
          return await task(controller.signal);
        } catch (err) {
          return fail('backend_failure', `${options.label}: ${toErrorMessage(err)}`);
        }
      })();

  try {
    return await Promise.race([attempt, deadline]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) parent?.removeEventListener('abort', onParentAbort);
  }
}
