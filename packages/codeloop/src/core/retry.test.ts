import { describe, expect, it } from "vitest";
import { TransportError } from "./errors.js";
import { computeBackoffDelay, resolveRetryConfig, withTransportRetry } from "./retry.js";

describe("resolveRetryConfig", () => {
  it("retries forever with capped backoff by default", () => {
    const config = resolveRetryConfig();

    expect(config.enabled).toBe(true);
    expect(config.retries).toBe(Number.POSITIVE_INFINITY);
    expect([1, 2, 3, 4, 5].map((attempt) => computeBackoffDelay(attempt, config))).toEqual([
      5000, 10000, 20000, 30000, 30000,
    ]);
  });

  it("keeps given values", () => {
    const config = resolveRetryConfig({ retries: 2, minTimeout: 100, factor: 3 });

    expect(config.retries).toBe(2);
    expect(computeBackoffDelay(2, config)).toBe(300);
  });
});

describe("withTransportRetry", () => {
  it("retries until the call succeeds", async () => {
    const attempts: number[] = [];
    let calls = 0;
    const config = resolveRetryConfig({
      minTimeout: 1,
      maxTimeout: 1,
      onRetry: (_error, attempt) => {
        attempts.push(attempt);
      },
    });

    const result = await withTransportRetry(async () => {
      calls++;
      if (calls < 3) throw new Error("overloaded");
      return "ok";
    }, config);

    expect(result).toBe("ok");
    expect(attempts).toEqual([1, 2]);
  });

  it("wraps failures in TransportError", async () => {
    const config = resolveRetryConfig({ enabled: false });

    await expect(
      withTransportRetry(async () => {
        throw new Error("connection refused");
      }, config),
    ).rejects.toThrow(new TransportError(new Error("connection refused")));
  });

  it("stops when shouldRetry declines", async () => {
    let calls = 0;
    const config = resolveRetryConfig({ minTimeout: 1, maxTimeout: 1, shouldRetry: () => false });

    await expect(
      withTransportRetry(async () => {
        calls++;
        throw new Error("invalid api key");
      }, config),
    ).rejects.toBeInstanceOf(TransportError);
    expect(calls).toBe(1);
  });

  it("gives up after the configured retries", async () => {
    let calls = 0;
    const config = resolveRetryConfig({ retries: 2, minTimeout: 1, maxTimeout: 1 });

    await expect(
      withTransportRetry(async () => {
        calls++;
        throw new Error("down");
      }, config),
    ).rejects.toThrow("Model call failed: down");
    expect(calls).toBe(3);
  });
});
