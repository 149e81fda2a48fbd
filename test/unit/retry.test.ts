import { describe, it, expect, vi } from "vitest";
import { withDeadline, withRetry } from "../../src/utils/retry.js";
import { PublishConflictError, UnitTimeoutError, isTransient } from "../../src/utils/errors.js";
import { httpError } from "../fixtures/fakes.js";

describe("withRetry", () => {
  it("retries until the call succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(httpError(503))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, { baseDelayMs: 1, retryOn: isTransient })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("gives up after maxAttempts", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(500));

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 1, retryOn: isTransient })).rejects.toThrow(
      "HTTP 500"
    );
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry permanent errors", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(422));

    await expect(withRetry(fn, { baseDelayMs: 1, retryOn: isTransient })).rejects.toThrow("HTTP 422");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("stops retrying once the signal aborts", async () => {
    const controller = new AbortController();
    const fn = vi.fn<() => Promise<string>>().mockImplementation(async () => {
      controller.abort();
      throw httpError(503);
    });

    await expect(withRetry(fn, { baseDelayMs: 1, signal: controller.signal })).rejects.toThrow("HTTP 503");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("withDeadline", () => {
  it("resolves with the result inside the deadline", async () => {
    await expect(withDeadline(1000, async () => 42, () => new Error("late"))).resolves.toBe(42);
  });

  it("rejects and aborts the signal when the deadline passes", async () => {
    let seen: AbortSignal | undefined;
    const pending = withDeadline(
      10,
      (signal) => {
        seen = signal;
        return new Promise<never>(() => {});
      },
      () => new UnitTimeoutError(10)
    );

    await expect(pending).rejects.toBeInstanceOf(UnitTimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it("propagates the parent's abort reason", async () => {
    const parent = new AbortController();
    const pending = withDeadline(
      1000,
      () => new Promise<never>(() => {}),
      () => new Error("child timeout"),
      parent.signal
    );
    parent.abort(new UnitTimeoutError(5));

    await expect(pending).rejects.toThrow("Unit of work exceeded 5ms");
  });
});

describe("isTransient", () => {
  it("classifies errors", () => {
    expect(isTransient(httpError(429))).toBe(true);
    expect(isTransient(httpError(502))).toBe(true);
    expect(isTransient(httpError(404))).toBe(false);
    expect(isTransient(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe(true);
    expect(isTransient(new PublishConflictError("lost"))).toBe(false);
    expect(isTransient(new Error("plain"))).toBe(false);
  });
});
