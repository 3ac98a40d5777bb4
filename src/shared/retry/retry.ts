export type Sleep = (ms: number) => Promise<void>;

export type RetryOptions = {
  retries: number;          // extra attempts after the first; Infinity keeps retrying until fn resolves
  delayMs: number;          // wait between attempts
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  sleep?: Sleep;
};

export const sleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms));

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, delayMs, onRetry, onGiveUp, sleep: wait = sleep } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retries) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await wait(delayMs);
      attempt += 1;
    }
  }
};
