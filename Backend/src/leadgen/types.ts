// src/leadgen/types.ts
/**
 * Shapes that flow through the signal pipeline.
 * Records are created per search call and never persisted.
 */

export const SOURCES = ["reddit", "linkedin", "x"] as const;
export type Source = (typeof SOURCES)[number];

/** A discovered post/mention, normalized across platforms. */
export interface PostRecord {
  source: Source;
  title: string;
  url: string;        // absolute URL, or whatever the source gave us
  snippet: string;
  timestamp?: string; // ISO-8601, best effort; may be missing or garbage
}

/** Only lives inside the ranker. */
export interface ScoredRecord {
  record: PostRecord;
  score: number;
}

export interface JudgmentResult {
  url: string;
  keep: boolean;
  reason: string;
}

/** What the semantic filter gets to see of a record. */
export type JudgeItem = Pick<PostRecord, "title" | "snippet" | "url">;

/** Per-source result streams, each in the source's own relevance order. */
export type SourceResults = Partial<Record<Source, PostRecord[]>>;
