// tests/shutdown.spec.ts
import { afterEach, describe, it, expect, vi } from "vitest";
import { enableGracefulShutdown, type Closable } from "../src/shared/shutdown";

function fakeServer(result: "ok" | "error" | "hang"): Closable & { closes: number } {
  return {
    closes: 0,
    close(callback) {
      this.closes++;
      if (result === "ok") callback();
      if (result === "error") callback(new Error("still busy"));
    },
  };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("enableGracefulShutdown", () => {
  it("closes the server, then the extra resources, then exits 0", () => {
    const order: string[] = [];
    const server = fakeServer("ok");
    const exit = vi.fn((code: number) => { order.push(`exit ${code}`); });
    const stop = enableGracefulShutdown(server, { signals: [], exit, onClose: () => order.push("pool closed") });

    stop("SIGTERM");
    expect(server.closes).toBe(1);
    expect(order).toEqual(["pool closed", "exit 0"]);
  });

  it("runs only once", () => {
    const server = fakeServer("ok");
    const exit = vi.fn();
    const stop = enableGracefulShutdown(server, { signals: [], exit });
    stop("SIGINT");
    stop("SIGTERM");
    expect(server.closes).toBe(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it("exits 1 when the server fails to close", () => {
    const exit = vi.fn();
    const onClose = vi.fn();
    enableGracefulShutdown(fakeServer("error"), { signals: [], exit, onClose })("SIGTERM");
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("forces exit 1 after the timeout", () => {
    vi.useFakeTimers();
    const exit = vi.fn();
    enableGracefulShutdown(fakeServer("hang"), { signals: [], exit, timeoutMs: 2000 })("SIGTERM");
    vi.advanceTimersByTime(1999);
    expect(exit).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(exit).toHaveBeenCalledWith(1);
  });
});
