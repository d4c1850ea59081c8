import { describe, expect, it, vi } from "vitest";
import { KeyedLock } from "@/lib/utils/keyed-lock";
import { retryWithBackoff, sleep } from "@/lib/utils/retry";
import { withTimeout } from "@/lib/utils/timeout";

describe("KeyedLock", () => {
  it("runs tasks under one key in arrival order and releases the key", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.runExclusive("abc123", async () => {
      events.push("first:start");
      await firstGate;
      events.push("first:end");
    });
    const second = lock.runExclusive("abc123", async () => {
      events.push("second");
    });
    const other = lock.runExclusive("def456", async () => {
      events.push("other");
    });

    await other;
    expect(events).toEqual(["first:start", "other"]);
    expect(lock.isLocked("abc123")).toBe(true);

    releaseFirst();
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "other", "first:end", "second"]);
    expect(lock.isLocked("abc123")).toBe(false);
  });

  it("keeps serving the key after a task throws", async () => {
    const lock = new KeyedLock();

    await expect(lock.runExclusive("abc123", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(lock.runExclusive("abc123", async () => "next")).resolves.toBe("next");
  });
});

describe("withTimeout", () => {
  it("resolves with the operation result", async () => {
    await expect(withTimeout(async () => 42, 1000, () => new Error("late"))).resolves.toBe(42);
  });

  it("rejects with the timeout error and aborts the operation signal", async () => {
    let seen: AbortSignal | null = null;

    await expect(
      withTimeout(
        (signal) => {
          seen = signal;
          return new Promise<never>(() => undefined);
        },
        10,
        () => new Error("took too long"),
      ),
    ).rejects.toThrow("took too long");

    expect(seen).toMatchObject({ aborted: true });
  });

  it("forwards a parent abort", async () => {
    const parent = new AbortController();

    const pending = withTimeout(
      (signal) =>
        new Promise<string>((_, reject) => {
          signal.addEventListener("abort", () => reject(new Error("cancelled")), { once: true });
        }),
      1000,
      () => new Error("late"),
      parent.signal,
    );
    parent.abort();

    await expect(pending).rejects.toThrow("cancelled");
  });
});

describe("retryWithBackoff", () => {
  it("retries with exponential delays until the operation succeeds", async () => {
    const onRetry = vi.fn();
    let calls = 0;

    const result = await retryWithBackoff(
      async () => {
        calls += 1;
        if (calls < 3) {
          throw new Error(`attempt ${calls}`);
        }
        return "ok";
      },
      { maxRetries: 3, baseDelayMs: 1, onRetry },
    );

    expect(result).toBe("ok");
    expect(onRetry.mock.calls.map(([attempt, , delayMs]) => [attempt, delayMs])).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it("gives up after maxRetries", async () => {
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls += 1;
          throw new Error("still down");
        },
        { maxRetries: 2, baseDelayMs: 0 },
      ),
    ).rejects.toThrow("still down");
    expect(calls).toBe(3);
  });

  it("stops at errors the caller marks as permanent", async () => {
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls += 1;
          throw new Error("gone for good");
        },
        { maxRetries: 5, baseDelayMs: 0, shouldRetry: () => false },
      ),
    ).rejects.toThrow("gone for good");
    expect(calls).toBe(1);
  });

  it("caps the delay and stops waiting once aborted", async () => {
    const controller = new AbortController();
    const delays: number[] = [];
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls += 1;
          throw new Error(`attempt ${calls}`);
        },
        {
          maxRetries: 5,
          baseDelayMs: 10_000,
          maxDelayMs: 5_000,
          onRetry: (_attempt, _error, delayMs) => {
            delays.push(delayMs);
            controller.abort();
          },
          signal: controller.signal,
        },
      ),
    ).rejects.toThrow("attempt 1");
    expect(delays).toEqual([5_000]);
    expect(calls).toBe(1);
  });
});

describe("sleep", () => {
  it("resolves early when its signal aborts", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
  });
});
