export type Admission = {
  admitted: boolean;
  remaining: number;
  // Milliseconds until the oldest admitted request leaves the window; 0 when admitted.
  retryAfterMs: number;
};

/**
 * Sliding-window admission gate. Each user keeps the timestamps of admitted
 * requests inside the trailing window; stale ones are pruned on the next check.
 */
export const createRateLimiter = ({
  maxRequests = 5,
  windowMs = 60_000,
  now = () => Date.now(),
}: { maxRequests?: number; windowMs?: number; now?: () => number } = {}) => {
  const requests = new Map<string, number[]>();
  let lastSweep = now();

  // Drops users whose newest admission has left the window, once per window.
  const sweep = (current: number, windowStart: number) => {
    if (current - lastSweep < windowMs) return;
    lastSweep = current;
    for (const [id, stamps] of requests) {
      if (stamps[stamps.length - 1] <= windowStart) requests.delete(id);
    }
  };

  const check = (userId: string): Admission => {
    const current = now();
    const windowStart = current - windowMs;
    sweep(current, windowStart);
    const recent = (requests.get(userId) ?? []).filter((stamp) => stamp > windowStart);

    if (recent.length < maxRequests) {
      recent.push(current);
      requests.set(userId, recent);
      return { admitted: true, remaining: maxRequests - recent.length, retryAfterMs: 0 };
    }

    requests.set(userId, recent);
    return { admitted: false, remaining: 0, retryAfterMs: Math.max(0, recent[0] + windowMs - current) };
  };

  return { check, trackedUsers: () => requests.size };
};

export type RateLimiter = ReturnType<typeof createRateLimiter>;
