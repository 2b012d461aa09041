// lib/retry.ts
// コアは再試行しない。cron など外側の呼び出しで使う

export type RetryOptions = {
  attempts?: number;
  delayMs?: number;
  label?: string;
  sleep?: (ms: number) => Promise<void>;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetries<T>(task: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = options.attempts ?? 3;
  const delayMs = options.delayMs ?? 5000;
  const label = options.label ?? 'task';
  const sleep = options.sleep ?? defaultSleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await task();
    } catch (error) {
      lastError = error;
      if (attempt < attempts) {
        console.warn(`${label} failed (attempt ${attempt}/${attempts}), retrying...`, error);
        await sleep(delayMs);
      }
    }
  }
  throw lastError;
}
