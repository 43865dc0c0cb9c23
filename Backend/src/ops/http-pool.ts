// src/ops/http-pool.ts
/**
 * Shared outbound HTTP gate for every external call (search + LLM).
 *  - at most `maxConnections` requests in flight; the rest wait FIFO
 *  - per-request timeout via AbortController
 *  - slot is released on success, error, or when a stream consumer stops
 * No retries here: failures surface as UpstreamError.
 */

import { log } from "../logger";
import { UpstreamError, errorMessage } from "../shared/errors";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpPoolOptions {
  maxConnections?: number;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
}

const DEFAULT_MAX_CONNECTIONS = 100;
const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_ERROR_BODY = 500;

/** Never echo query strings: the CSE key travels there. */
function safeUrl(url: string): string {
  const q = url.indexOf("?");
  return q === -1 ? url : url.slice(0, q);
}

function deadline(timeoutMs: number, outer?: AbortSignal | null) {
  const ctrl = new AbortController();
  let timedOut = false;
  const onAbort = () => ctrl.abort(outer?.reason);
  if (outer) {
    if (outer.aborted) ctrl.abort(outer.reason);
    else outer.addEventListener("abort", onAbort, { once: true });
  }
  let timer: NodeJS.Timeout | undefined = setTimeout(() => {
    timedOut = true;
    ctrl.abort();
  }, timeoutMs);

  const clearTimer = () => {
    if (timer) clearTimeout(timer);
    timer = undefined;
  };
  return {
    signal: ctrl.signal,
    timedOut: () => timedOut,
    clearTimer,
    dispose: () => {
      clearTimer();
      outer?.removeEventListener("abort", onAbort);
    },
  };
}

export class HttpPool {
  readonly max: number;
  readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private active = 0;
  private waiters: Waiter[] = [];
  private closed = false;

  constructor(opts: HttpPoolOptions = {}) {
    this.max = Math.max(1, opts.maxConnections ?? DEFAULT_MAX_CONNECTIONS);
    this.timeoutMs = Math.max(1, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  stats() {
    return { active: this.active, queued: this.waiters.length, max: this.max };
  }

  /** GET/POST and parse a JSON body. Throws UpstreamError on non-2xx or timeout. */
  async json(url: string, init: RequestInit = {}): Promise<unknown> {
    await this.acquire();
    const d = deadline(this.timeoutMs, init.signal);
    try {
      const res = await this.fetchImpl(url, { ...init, signal: d.signal });
      const text = await res.text();
      if (!res.ok) {
        throw new UpstreamError(
          `${safeUrl(url)} responded ${res.status}`,
          res.status,
          safeUrl(url),
          text.slice(0, MAX_ERROR_BODY)
        );
      }
      try {
        return text ? JSON.parse(text) : {};
      } catch {
        throw new UpstreamError(`${safeUrl(url)} returned invalid JSON`, res.status, safeUrl(url), text.slice(0, MAX_ERROR_BODY));
      }
    } catch (err) {
      throw this.wrap(err, url, d.timedOut(), init.signal);
    } finally {
      d.dispose();
      this.release();
    }
  }

  /**
   * Streamed body as text lines (no trailing "\n" / "\r").
   * The timeout covers connect + headers; after that only `init.signal` can stop it.
   */
  async *lines(url: string, init: RequestInit = {}): AsyncGenerator<string, void, void> {
    await this.acquire();
    const d = deadline(this.timeoutMs, init.signal);
    try {
      let res: Response;
      try {
        res = await this.fetchImpl(url, { ...init, signal: d.signal });
      } catch (err) {
        throw this.wrap(err, url, d.timedOut(), init.signal);
      }
      d.clearTimer();

      if (!res.ok || !res.body) {
        const body = await res.text().catch((err: unknown) => errorMessage(err));
        throw new UpstreamError(`${safeUrl(url)} stream responded ${res.status}`, res.status, safeUrl(url), body.slice(0, MAX_ERROR_BODY));
      }

      const reader = res.body.getReader();
      const decoder = new TextDecoder("utf-8");
      let buf = "";
      let finished = false;
      try {
        while (true) {
          const { done, value } = await reader.read();
          if (done) break;
          buf += decoder.decode(value, { stream: true });
          let idx: number;
          while ((idx = buf.indexOf("\n")) !== -1) {
            const line = buf.slice(0, idx).replace(/\r$/, "");
            buf = buf.slice(idx + 1);
            yield line;
          }
        }
        buf += decoder.decode();
        if (buf) yield buf.replace(/\r$/, "");
        finished = true;
      } finally {
        if (!finished) {
          // consumer bailed out early (or aborted): drop the socket
          reader.cancel().catch((err: unknown) => log.debug({ err: errorMessage(err) }, "[http-pool] cancel failed"));
        }
      }
    } finally {
      d.dispose();
      this.release();
    }
  }

  /** Rejects everyone still waiting for a slot; later calls fail fast. */
  close() {
    this.closed = true;
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const w of pending) w.reject(new Error("HttpPool closed"));
  }

  private acquire(): Promise<void> {
    if (this.closed) return Promise.reject(new Error("HttpPool closed"));
    if (this.active < this.max) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  private release() {
    const next = this.waiters.shift();
    if (next) next.resolve(); // hand the slot over; active count unchanged
    else this.active--;
  }

  private wrap(err: unknown, url: string, timedOut: boolean, outer?: AbortSignal | null): Error {
    if (err instanceof UpstreamError) return err;
    if (timedOut) return new UpstreamError(`${safeUrl(url)} timed out after ${this.timeoutMs}ms`, undefined, safeUrl(url));
    if (outer?.aborted && err instanceof Error) return err;
    return new UpstreamError(`${safeUrl(url)} request failed: ${errorMessage(err)}`, undefined, safeUrl(url));
  }
}
