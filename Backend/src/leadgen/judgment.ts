// src/leadgen/judgment.ts
/**
 * Tolerant reader for the semantic filter's reply. The model is asked for a
 * JSON array but also answers with {results:[...]}, {items:[...]} or a single
 * object. Each shape is its own variant; anything else falls to a fallback.
 */

import { z } from "zod";
import type { JudgeItem, JudgmentResult } from "./types";

export const judgmentSchema = z.object({
  url: z.string(),
  keep: z.boolean(),
  reason: z.string(),
});

const judgmentList = z.array(judgmentSchema);

export type ParsedJudgments =
  | { kind: "array" | "results" | "items" | "single"; judgments: JudgmentResult[] }
  | { kind: "unrecognized" }
  | { kind: "invalid"; error: string };

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function readList(
  kind: "array" | "results" | "items",
  value: unknown
): ParsedJudgments {
  const parsed = judgmentList.safeParse(value);
  if (!parsed.success) return { kind: "invalid", error: parsed.error.message };
  return { kind, judgments: parsed.data };
}

export function parseJudgments(text: string): ParsedJudgments {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    return { kind: "invalid", error: err instanceof Error ? err.message : String(err) };
  }

  if (Array.isArray(data)) return readList("array", data);
  if (!isObject(data)) return { kind: "unrecognized" };

  if ("results" in data) return readList("results", data.results);
  if ("items" in data) return readList("items", data.items);
  if ("url" in data && "keep" in data) {
    const one = judgmentSchema.safeParse(data);
    if (!one.success) return { kind: "invalid", error: one.error.message };
    return { kind: "single", judgments: [one.data] };
  }
  return { kind: "unrecognized" };
}

export const KEEP_ALL_REASON = "Filter failed, keeping all";

export function keepAll(items: readonly JudgeItem[]): JudgmentResult[] {
  return items.map((i) => ({ url: i.url, keep: true, reason: KEEP_ALL_REASON }));
}

/** `invalid` means we could not read the verdicts at all: keep everything. */
export function judgmentsOrKeepAll(
  parsed: ParsedJudgments,
  items: readonly JudgeItem[]
): JudgmentResult[] {
  switch (parsed.kind) {
    case "invalid":
      return keepAll(items);
    case "unrecognized":
      return [];
    default:
      return parsed.judgments;
  }
}
