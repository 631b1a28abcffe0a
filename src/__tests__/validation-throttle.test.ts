import { describe, it, expect, vi } from "vitest";
import { ValidationThrottle } from "../validation-throttle.js";

function createClock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("ValidationThrottle", () => {
  it("runs the first validation immediately", async () => {
    const validate = vi.fn(async () => {});
    const throttle = new ValidationThrottle(validate, { now: createClock().now });
    expect(await throttle.run("file:///a.nu")).toBe(true);
    expect(validate).toHaveBeenCalledWith("file:///a.nu");
  });

  it("skips requests less than 500ms after the last validation", async () => {
    const clock = createClock();
    const validate = vi.fn(async () => {});
    const throttle = new ValidationThrottle(validate, { now: clock.now });

    await throttle.run("file:///a.nu");
    clock.advance(200);
    expect(await throttle.run("file:///a.nu")).toBe(false);
    expect(validate).toHaveBeenCalledTimes(1);
  });

  it("runs requests spaced more than 500ms apart", async () => {
    const clock = createClock();
    const validate = vi.fn(async () => {});
    const throttle = new ValidationThrottle(validate, { now: clock.now });

    await throttle.run("file:///a.nu");
    clock.advance(501);
    await throttle.run("file:///a.nu");
    clock.advance(600);
    await throttle.run("file:///a.nu");
    expect(validate).toHaveBeenCalledTimes(3);
  });

  it("shares one clock across documents", async () => {
    const clock = createClock();
    const validate = vi.fn(async () => {});
    const throttle = new ValidationThrottle(validate, { now: clock.now });

    await throttle.run("file:///a.nu");
    clock.advance(100);
    expect(await throttle.run("file:///b.nu")).toBe(false);
  });

  it("measures the gap from the end of the last validation", async () => {
    const clock = createClock();
    const throttle = new ValidationThrottle(
      async () => {
        clock.advance(400);
      },
      { now: clock.now },
    );

    await throttle.run("file:///a.nu");
    clock.advance(300);
    // 700ms since the start, 300ms since completion
    expect(await throttle.run("file:///a.nu")).toBe(false);
  });

  it("does not advance the clock when validation fails", async () => {
    const clock = createClock();
    const validate = vi.fn(async () => {});
    validate.mockRejectedValueOnce(new Error("spawn failed"));
    const throttle = new ValidationThrottle(validate, { now: clock.now });

    await expect(throttle.run("file:///a.nu")).rejects.toThrow("spawn failed");
    clock.advance(10);
    expect(await throttle.run("file:///a.nu")).toBe(true);
  });

  it("skips requests while a validation is still running", async () => {
    const clock = createClock();
    let finish = () => {};
    const validate = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = () => resolve();
        }),
    );
    const throttle = new ValidationThrottle(validate, { now: clock.now });

    const first = throttle.run("file:///a.nu");
    clock.advance(800);
    expect(await throttle.run("file:///a.nu")).toBe(false);

    finish();
    expect(await first).toBe(true);
    expect(validate).toHaveBeenCalledTimes(1);
  });

  it("runs again once a failed validation has settled", async () => {
    const clock = createClock();
    let fail = (_err: Error) => {};
    const validate = vi.fn(
      () =>
        new Promise<void>((_resolve, reject) => {
          fail = reject;
        }),
    );
    const throttle = new ValidationThrottle(validate, { now: clock.now });

    const first = throttle.run("file:///a.nu");
    fail(new Error("timeout"));
    await expect(first).rejects.toThrow("timeout");

    validate.mockResolvedValueOnce(undefined);
    expect(await throttle.run("file:///a.nu")).toBe(true);
  });

  it("honours a custom interval", async () => {
    const clock = createClock();
    const validate = vi.fn(async () => {});
    const throttle = new ValidationThrottle(validate, { now: clock.now, intervalMs: 50 });

    await throttle.run("file:///a.nu");
    clock.advance(60);
    expect(await throttle.run("file:///a.nu")).toBe(true);
  });
});
