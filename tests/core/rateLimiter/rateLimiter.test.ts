import { describe, expect, it } from "vitest";
import { RateLimiter } from "../../../core/rateLimiter/rateLimiter.js";

function clock(start = 0) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    }
  };
}

describe("RateLimiter", () => {
  it("allows up to max requests per window", () => {
    const time = clock();
    const limiter = new RateLimiter(10_000, 3, 0, time.now);

    expect([1, 2, 3, 4].map(() => limiter.check("ip"))).toEqual([true, true, true, false]);
  });

  it("keeps keys apart", () => {
    const time = clock();
    const limiter = new RateLimiter(10_000, 1, 0, time.now);

    expect(limiter.check("a")).toBe(true);
    expect(limiter.check("b")).toBe(true);
    expect(limiter.check("a")).toBe(false);
  });

  it("opens a fresh window once the old one ends", () => {
    const time = clock();
    const limiter = new RateLimiter(10_000, 1, 0, time.now);

    limiter.check("ip");
    expect(limiter.check("ip")).toBe(false);

    time.advance(10_000);
    expect(limiter.check("ip")).toBe(true);
  });

  it("keeps an offender blocked for the block duration", () => {
    const time = clock();
    const limiter = new RateLimiter(10_000, 2, 60_000, time.now);

    limiter.check("ip");
    limiter.check("ip");
    expect(limiter.check("ip")).toBe(false);

    time.advance(30_000);
    expect(limiter.check("ip")).toBe(false);

    time.advance(30_000);
    expect(limiter.check("ip")).toBe(true);
    expect(limiter.check("ip")).toBe(true);
    expect(limiter.check("ip")).toBe(false);
  });

  it("sweeps stale buckets when the table grows large", () => {
    const time = clock();
    const limiter = new RateLimiter(1_000, 5, 0, time.now);

    for (let i = 0; i < 10_000; i++) limiter.check(`old-${i}`);
    expect(limiter.size).toBe(10_000);

    time.advance(1_000);
    limiter.check("new");
    expect(limiter.size).toBe(1);
  });
});
