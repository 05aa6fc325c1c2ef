/**
 * Result of a collaborator call that may fall back.
 * `degraded` carries the substituted value and why the real one is missing.
 */
export type StageOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'degraded'; value: T; reason: string }
  | { status: 'failed'; reason: string };

export const ok = <T>(value: T): StageOutcome<T> => ({ status: 'ok', value });

export const degraded = <T>(value: T, reason: string): StageOutcome<T> => ({
  status: 'degraded',
  value,
  reason,
});

export const failed = <T>(reason: string): StageOutcome<T> => ({ status: 'failed', reason });

/** A collaborator resolved once at construction time. */
export type Capability<T> =
  | { available: true; handle: T }
  | { available: false; reason: string };

export const available = <T>(handle: T): Capability<T> => ({ available: true, handle });

export const unavailable = <T>(reason: string): Capability<T> => ({ available: false, reason });

/**
 * Abort after `timeoutMs`, or as soon as `parent` aborts, whichever comes first.
 */
export const timeoutSignal = (timeoutMs: number, parent?: AbortSignal): AbortSignal => {
  const timeout = AbortSignal.timeout(timeoutMs);
  if (!parent) return timeout;

  const controller = new AbortController();
  const forward = (source: AbortSignal) => {
    if (!controller.signal.aborted) controller.abort(source.reason);
  };

  if (parent.aborted) {
    forward(parent);
    return controller.signal;
  }
  timeout.addEventListener('abort', () => forward(timeout), { once: true });
  parent.addEventListener('abort', () => forward(parent), { once: true });
  return controller.signal;
};

/**
 * Settles with `work`, or rejects with the abort reason as soon as `signal` aborts.
 * For clients that take no signal: the call keeps running but nobody waits on it.
 */
export const untilAborted = <T>(work: Promise<T>, signal?: AbortSignal): Promise<T> => {
  if (!signal) return work;
  signal.throwIfAborted();
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
};
