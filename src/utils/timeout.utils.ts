/**
 * Rejects with `onTimeout()` when `promise` has not settled within `timeoutMs`.
 * The timer is always cleared so a pending lookup never holds the event loop open.
 */
export const withTimeout = <T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
};

/**
 * Seconds left until `exp` (a JWT timestamp), never below one so Redis accepts it as a TTL.
 */
export const remainingLifetimeSeconds = (exp: number, nowMs: number): number =>
  Math.max(1, exp - Math.floor(nowMs / 1000));
