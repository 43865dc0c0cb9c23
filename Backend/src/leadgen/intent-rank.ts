// src/leadgen/intent-rank.ts
/**
 * Deterministic pre-ranking of search hits before the (expensive) semantic
 * filter. Score = source prior + recency + query-term overlap + buying-intent
 * phrase bonus. Pure: the only outside input is the clock, which is passed in.
 */

import {
  BUYING_SIGNALS,
  BUYING_SIGNAL_BONUS,
  DEFAULT_TOP_N,
  RECENCY,
  SOURCE_WEIGHTS,
  TERM_WEIGHTS,
} from "./intent-weights";
import type { PostRecord, ScoredRecord } from "./types";

export type Clock = () => number; // epoch ms

const DAY_MS = 24 * 60 * 60 * 1000;

/** Lowercase + whitespace split of every query. Repeats are kept. */
export function extractQueryTerms(queries: readonly string[]): string[] {
  const terms: string[] = [];
  for (const q of queries) {
    for (const t of q.toLowerCase().split(/\s+/)) {
      if (t) terms.push(t);
    }
  }
  return terms;
}

export function sourceScore(url: string): number {
  const u = url.toLowerCase();
  for (const sw of SOURCE_WEIGHTS) {
    if (sw.pattern.test(u)) return sw.weight;
  }
  return 0;
}

// YYYY-MM-DD[(T| )hh:mm[:ss[.fff]]][Z|±hh:mm]
const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}:\d{2})?$/i;

/**
 * Epoch ms of an ISO-8601 timestamp, or null for anything else
 * ("June 1, 2024", RFC-2822, ...). Values without a zone are read as UTC,
 * never as host-local time.
 */
export function parseIsoTimestamp(timestamp: string): number | null {
  const m = ISO_TIMESTAMP.exec(timestamp.trim());
  if (!m) return null;
  const [, date, hhmm = "00:00", ss = "00", frac = "", zone = "Z"] = m;
  const ms = frac.slice(0, 3).padEnd(3, "0");
  const t = Date.parse(`${date}T${hhmm}:${ss}.${ms}${zone.toUpperCase()}`);
  return Number.isNaN(t) ? null : t;
}

/** Whole days since `timestamp`, or null when absent or not ISO-8601. */
export function ageInDays(timestamp: string | undefined, nowMs: number): number | null {
  if (!timestamp) return null;
  const t = parseIsoTimestamp(timestamp);
  if (t === null) return null;
  return Math.floor((nowMs - t) / DAY_MS);
}

export function recencyScore(timestamp: string | undefined, nowMs: number): number {
  const age = ageInDays(timestamp, nowMs);
  if (age === null || age >= RECENCY.windowDays) return 0;
  // future-dated posts count as brand new
  const days = Math.max(0, age);
  return RECENCY.maxBonus * (1 - days / RECENCY.windowDays);
}

export function termScore(title: string, snippet: string, terms: readonly string[]): number {
  let score = 0;
  for (const term of new Set(terms)) {
    if (title.includes(term)) score += TERM_WEIGHTS.title;
    if (snippet.includes(term)) score += TERM_WEIGHTS.snippet;
  }
  return score;
}

export function buyingSignalScore(title: string, snippet: string): number {
  const text = `${title} ${snippet}`;
  return BUYING_SIGNALS.some((s) => text.includes(s)) ? BUYING_SIGNAL_BONUS : 0;
}

export function scoreIntent(
  record: PostRecord,
  queryTerms: readonly string[],
  nowMs: number = Date.now()
): number {
  const title = (record.title || "").toLowerCase();
  const snippet = (record.snippet || "").toLowerCase();
  return (
    sourceScore(record.url) +
    recencyScore(record.timestamp, nowMs) +
    termScore(title, snippet, queryTerms) +
    buyingSignalScore(title, snippet)
  );
}

export interface RankOptions {
  topN?: number;
  now?: Clock;
}

/**
 * Score, stable-sort descending, keep the first `topN`.
 * Ties keep input order (the mixer's interleave carries meaning).
 */
export function rankByIntent(
  records: readonly PostRecord[],
  queries: readonly string[],
  opts: RankOptions = {}
): PostRecord[] {
  const topN = Math.max(0, opts.topN ?? DEFAULT_TOP_N);
  const nowMs = (opts.now ?? Date.now)();
  const terms = extractQueryTerms(queries);

  const scored: ScoredRecord[] = records.map((record) => ({
    record,
    score: scoreIntent(record, terms, nowMs),
  }));
  // Array.prototype.sort is stable (ES2019+)
  scored.sort((a, b) => b.score - a.score);

  return scored.slice(0, topN).map((s) => s.record);
}
