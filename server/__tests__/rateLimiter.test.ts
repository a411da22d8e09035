import { describe, it, expect, beforeEach } from "vitest";
import { RateLimiter } from "../services/rateLimiter";
import { RateLimitError } from "../utils/errorHandler";

describe("RateLimiter", () => {
  let now: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    now = 1_000_000;
    limiter = new RateLimiter({
      cooldownSeconds: 10,
      maxRequestsPerWindow: 3,
      windowMs: 60_000,
      now: () => now,
    });
  });

  it("allows the first request and records it", () => {
    expect(limiter.check("user-1")).toEqual({ limited: false });
    expect(limiter.trackedUsers).toBe(1);
  });

  it("enforces the cooldown between requests", () => {
    limiter.check("user-1");
    now += 4_000;
    expect(limiter.check("user-1")).toEqual({ limited: true, waitSeconds: 6, reason: "cooldown" });
  });

  it("does not record rejected requests", () => {
    limiter.check("user-1");
    now += 4_000;
    limiter.check("user-1");
    now += 6_000;
    expect(limiter.check("user-1")).toEqual({ limited: false });
  });

  it("tracks users independently", () => {
    limiter.check("user-1");
    expect(limiter.check("user-2")).toEqual({ limited: false });
  });

  it("caps requests inside the sliding window", () => {
    limiter.check("user-1");
    now += 10_000;
    limiter.check("user-1");
    now += 10_000;
    limiter.check("user-1");
    now += 10_000;
    // oldest at 1_000_000, window ends at 1_060_000, now is 1_030_000
    expect(limiter.check("user-1")).toEqual({ limited: true, waitSeconds: 30, reason: "window" });
  });

  it("lets requests through once the oldest leaves the window", () => {
    limiter.check("user-1");
    now += 10_000;
    limiter.check("user-1");
    now += 10_000;
    limiter.check("user-1");
    now += 40_001;
    expect(limiter.check("user-1")).toEqual({ limited: false });
  });

  it("assertAllowed throws the cooldown notice", () => {
    limiter.assertAllowed("user-1");
    now += 2_500;
    expect(() => limiter.assertAllowed("user-1")).toThrow(RateLimitError);
    expect(() => limiter.assertAllowed("user-1")).toThrow("Please wait 7.5 seconds before making another request.");
  });

  it("assertAllowed throws the window notice", () => {
    for (let i = 0; i < 3; i++) {
      limiter.assertAllowed("user-1");
      now += 10_000;
    }
    expect(() => limiter.assertAllowed("user-1")).toThrow(
      "You've reached the maximum number of requests per minute. Please try again in 30.0 seconds.",
    );
  });

  it("cleanup drops users inactive past the threshold", () => {
    const tracker = new RateLimiter({ inactiveAfterMs: 1_000, aggressiveInactiveAfterMs: 500, now: () => now });
    tracker.check("old");
    now += 800;
    tracker.check("recent");
    now += 300;

    expect(tracker.cleanup(now, false)).toBe(1);
    expect(tracker.trackedUsers).toBe(1);
    expect(tracker.cleanup(now, true)).toBe(0);
  });

  it("cleans up aggressively once too many users are tracked", () => {
    const tracker = new RateLimiter({
      maxUsersTracked: 2,
      aggressiveInactiveAfterMs: 60_000,
      now: () => now,
    });
    tracker.check("a");
    now += 1;
    tracker.check("b");
    now += 1;
    tracker.check("c");
    now += 1;
    // three tracked, over the limit of two: keep the newest one
    tracker.check("d");
    expect(tracker.trackedUsers).toBe(2);
    expect(tracker.check("c")).toEqual({ limited: true, waitSeconds: 9.999, reason: "cooldown" });
  });
});
