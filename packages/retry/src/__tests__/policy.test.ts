import { describe, it, expect } from "vitest";
import { backoffDelay, createRetryPolicy, DEFAULT_RETRY_POLICY } from "../policy.js";

describe("createRetryPolicy", () => {
  it("defaults to three attempts and a two second base delay", () => {
    expect(createRetryPolicy()).toEqual({ maxAttempts: 3, baseDelayMs: 2000 });
    expect(DEFAULT_RETRY_POLICY).toEqual({ maxAttempts: 3, baseDelayMs: 2000 });
  });

  it("applies overrides and freezes the result", () => {
    const policy = createRetryPolicy({ maxAttempts: 5 });
    expect(policy).toEqual({ maxAttempts: 5, baseDelayMs: 2000 });
    expect(Object.isFrozen(policy)).toBe(true);
  });

  it("accepts a zero delay", () => {
    expect(createRetryPolicy({ baseDelayMs: 0 }).baseDelayMs).toBe(0);
  });

  it("rejects fewer than one attempt", () => {
    expect(() => createRetryPolicy({ maxAttempts: 0 })).toThrow();
  });

  it("rejects fractional attempt counts", () => {
    expect(() => createRetryPolicy({ maxAttempts: 2.5 })).toThrow();
  });

  it("rejects negative delays", () => {
    expect(() => createRetryPolicy({ baseDelayMs: -1 })).toThrow();
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt index", () => {
    const policy = createRetryPolicy({ baseDelayMs: 500 });
    expect([0, 1, 2, 3].map((i) => backoffDelay(policy, i))).toEqual([500, 1000, 2000, 4000]);
  });
});
