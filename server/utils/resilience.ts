export interface TimeoutOptions {
  timeoutMs: number;
  timeoutMessage?: string;
  signal?: AbortSignal;
}

const DEFAULT_TIMEOUT_OPTIONS: TimeoutOptions = {
  timeoutMs: 30000,
  timeoutMessage: "Operation timed out",
};

export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = "TimeoutError";
  }
}

export class AbortedError extends Error {
  constructor(message: string = "Operation was cancelled") {
    super(message);
    this.name = "AbortedError";
  }
}

export async function withTimeout<T>(
  operation: () => Promise<T>,
  options: Partial<TimeoutOptions> = {}
): Promise<T> {
  const { timeoutMs, timeoutMessage, signal } = { ...DEFAULT_TIMEOUT_OPTIONS, ...options };

  if (signal?.aborted) {
    throw new AbortedError();
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      reject(new TimeoutError(timeoutMessage || `Operation timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    signal?.addEventListener("abort", onAbort, { once: true });

    operation()
      .then((result) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        resolve(result);
      })
      .catch((error) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        reject(error);
      });
  });
}

export type SettledOutcome<T> =
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; reason: unknown };

// Results keep input order regardless of completion order.
export async function mapWithConcurrency<I, O>(
  items: readonly I[],
  limit: number,
  operation: (item: I, index: number) => Promise<O>
): Promise<SettledOutcome<O>[]> {
  const results: SettledOutcome<O>[] = new Array(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: "fulfilled", value: await operation(items[index], index) };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  }

  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
