export class OperationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "OperationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class OperationAbortedError extends Error {
  constructor(label: string) {
    super(`${label} was aborted`);
    this.name = "OperationAbortedError";
  }
}

export const throwIfAborted = (signal: AbortSignal, label: string): void => {
  if (signal.aborted) {
    throw new OperationAbortedError(label);
  }
};

/**
 * Runs `operation` with its own abort signal that fires when either the parent
 * signal aborts or `timeoutMs` elapses. The returned promise settles as soon as
 * the signal fires, so an operation that ignores its signal is abandoned rather
 * than awaited.
 */
export async function withTimeout<T>(
  label: string,
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    throw new OperationAbortedError(label);
  }

  const controller = new AbortController();
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const abandoned = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new OperationTimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    if (parentSignal) {
      onParentAbort = () => {
        const error = new OperationAbortedError(label);
        controller.abort(error);
        reject(error);
      };
      parentSignal.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), abandoned]);
  } finally {
    clearTimeout(timeoutHandle);
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener("abort", onParentAbort);
    }
  }
}
