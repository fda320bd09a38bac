import assert from "node:assert/strict";
import { test } from "node:test";
import { createRateLimiter } from "../src/limiter.js";

test("five requests are admitted, the sixth is rejected", () => {
  let now = 0;
  const limiter = createRateLimiter({ maxRequests: 5, windowMs: 60_000, now: () => now });

  const remaining: number[] = [];
  for (let i = 0; i < 5; i += 1) {
    const admission = limiter.check("u1");
    assert.equal(admission.admitted, true);
    remaining.push(admission.remaining);
    now += 1000;
  }
  assert.deepEqual(remaining, [4, 3, 2, 1, 0]);

  const rejected = limiter.check("u1");
  assert.equal(rejected.admitted, false);
  assert.equal(rejected.remaining, 0);
  // Oldest admission was at t=0; now is t=5000.
  assert.equal(rejected.retryAfterMs, 55_000);
});

test("admission recovers once the window slides past old requests", () => {
  let now = 0;
  const limiter = createRateLimiter({ maxRequests: 2, windowMs: 1000, now: () => now });

  limiter.check("u1");
  now = 500;
  limiter.check("u1");
  assert.equal(limiter.check("u1").admitted, false);

  now = 1000;
  const recovered = limiter.check("u1");
  assert.equal(recovered.admitted, true);
  assert.equal(recovered.remaining, 0);
});

test("users are limited independently", () => {
  const limiter = createRateLimiter({ maxRequests: 1, now: () => 0 });
  assert.equal(limiter.check("a").admitted, true);
  assert.equal(limiter.check("a").admitted, false);
  assert.equal(limiter.check("b").admitted, true);
});

test("rejected requests do not extend the window", () => {
  let now = 0;
  const limiter = createRateLimiter({ maxRequests: 1, windowMs: 1000, now: () => now });
  limiter.check("u1");
  now = 900;
  assert.equal(limiter.check("u1").admitted, false);
  now = 1000;
  assert.equal(limiter.check("u1").admitted, true);
});

test("users whose requests have all aged out are forgotten", () => {
  let now = 0;
  const limiter = createRateLimiter({ maxRequests: 2, windowMs: 1000, now: () => now });
  limiter.check("a");
  limiter.check("b");
  assert.equal(limiter.trackedUsers(), 2);

  now = 1500;
  limiter.check("c");
  assert.equal(limiter.trackedUsers(), 1);
});
