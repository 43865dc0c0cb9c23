// src/shared/shutdown.ts
// Stop accepting connections, then release outbound resources, then exit.

import { log } from "../logger";

/** What shutdown needs from an http.Server. */
export interface Closable {
  close(callback: (err?: Error) => void): unknown;
}

export interface ShutdownOpts {
  timeoutMs?: number;
  /** Runs once the server is closed (e.g. the outbound HTTP pool). */
  onClose?: () => void;
  signals?: NodeJS.Signals[];
  exit?: (code: number) => void;
}

const DEFAULT_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Hooks `signals` to a one-shot shutdown and returns the same routine so
 * callers can trigger it directly. Exits 0 on a clean close, 1 on a close
 * error or when the server hangs past `timeoutMs`.
 */
export function enableGracefulShutdown(server: Closable, opts: ShutdownOpts = {}): (reason: string) => void {
  const timeoutMs = Math.max(1000, opts.timeoutMs ?? 10_000);
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  let started = false;

  const shutdown = (reason: string) => {
    if (started) return;
    started = true;
    log.info({ reason }, "[shutdown] draining connections");

    const forced = setTimeout(() => {
      log.error({ timeoutMs }, "[shutdown] server did not close in time");
      exit(1);
    }, timeoutMs);
    forced.unref();

    server.close((err) => {
      clearTimeout(forced);
      opts.onClose?.();
      if (err) {
        log.error({ err }, "[shutdown] close failed");
        exit(1);
        return;
      }
      log.info("[shutdown] done");
      exit(0);
    });
  };

  for (const sig of opts.signals ?? DEFAULT_SIGNALS) process.once(sig, () => shutdown(sig));
  return shutdown;
}

/** Last-resort logging for errors nothing else caught. */
export function logProcessErrors() {
  process.on("unhandledRejection", (reason) => log.error({ err: reason }, "[process] unhandled rejection"));
  process.on("uncaughtException", (err) => log.error({ err }, "[process] uncaught exception"));
}
