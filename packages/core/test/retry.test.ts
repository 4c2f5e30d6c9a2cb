import { describe, expect, it, vi } from "vitest";
import { computeBackoffMs, withRetry } from "../src/utils/retry";

const policy = { attempts: 5, minDelayMs: 2000, maxDelayMs: 30000 };

describe("computeBackoffMs", () => {
  it("doubles from one second and clamps to the policy window", () => {
    expect([1, 2, 3, 4, 5, 6].map((attempt) => computeBackoffMs(policy, attempt))).toEqual([
      2000, 2000, 4000, 8000, 16000, 30000,
    ]);
  });
});

describe("withRetry", () => {
  it("retries until the operation succeeds", async () => {
    const sleep = vi.fn(async () => undefined);
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValue("ok");

    await expect(withRetry(operation, { policy, label: "test", sleep })).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [2000]]);
  });

  it("throws the last error once attempts are exhausted", async () => {
    const sleep = vi.fn(async () => undefined);
    let calls = 0;
    const operation = async (): Promise<never> => {
      calls += 1;
      throw new Error(`falha ${calls}`);
    };

    await expect(
      withRetry(operation, { policy: { attempts: 3, minDelayMs: 2000, maxDelayMs: 60000 }, label: "test", sleep }),
    ).rejects.toThrow("falha 3");
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("does not retry errors marked as permanent", async () => {
    const sleep = vi.fn(async () => undefined);
    const operation = vi.fn(async () => {
      throw new Error("bad request");
    });

    await expect(
      withRetry(operation, { policy, label: "test", sleep, isRetryable: () => false }),
    ).rejects.toThrow("bad request");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
