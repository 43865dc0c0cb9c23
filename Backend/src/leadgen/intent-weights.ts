// src/leadgen/intent-weights.ts
// Fixed priors for the heuristic ranker. Tune here, not in the scorer.

export interface SourceWeight {
  pattern: RegExp; // tested against the lowercased URL
  weight: number;
}

/** First match wins; order is the priority. */
export const SOURCE_WEIGHTS: readonly SourceWeight[] = [
  { pattern: /reddit\.com/, weight: 1.5 },
  { pattern: /linkedin\.com/, weight: 1.0 },
  // "x.com" only as a whole host label, so dropbox.com etc. don't count
  { pattern: /(?:^|[/.@])x\.com|twitter\.com/, weight: 0.7 },
];

export const RECENCY = {
  maxBonus: 2.0,
  windowDays: 180,
} as const;

export const TERM_WEIGHTS = {
  title: 0.8,
  snippet: 0.4,
} as const;

export const BUYING_SIGNAL_BONUS = 0.5;

/** Matched as plain substrings of "<title> <snippet>", lowercased. */
export const BUYING_SIGNALS: readonly string[] = [
  "our company",
  "our team",
  "we need",
  "looking for",
  "recommend",
  " vs ",
  "alternative",
  "switching from",
  "for our",
  "enterprise",
  "business",
  "comparing",
  "evaluation",
  "migrating",
  "replacing our",
];

export const DEFAULT_TOP_N = 60;
