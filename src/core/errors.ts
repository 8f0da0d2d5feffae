export class StoreUnavailableError extends Error {
  readonly op: string;

  constructor(op: string, cause?: unknown) {
    super(`store unavailable during ${op}`, { cause });
    this.name = "StoreUnavailableError";
    this.op = op;
  }
}

export class NotificationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "NotificationError";
  }
}

export class TimeoutError extends Error {
  readonly ms: number;

  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
    this.ms = ms;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Rejects with TimeoutError when `work` has not settled within `ms`. */
export async function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
