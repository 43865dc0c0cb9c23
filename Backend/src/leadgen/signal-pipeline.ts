// src/leadgen/signal-pipeline.ts
/**
 * SignalPipeline: one search request, end to end.
 *  1) fetch per-source hits (concurrently, external)
 *  2) round-robin mix across sources
 *  3) dedupe by identity key (URL sans query string)
 *  4) heuristic intent rank, truncated to topN
 *  5) semantic filter on the ranked head only
 *  6) kept records in ranked order (capped), or a top-K fallback
 *
 * Collaborators are injected so tests can run without network or clock.
 */

import { log as rootLog, type Logger } from "../logger";
import { errorMessage } from "../shared/errors";
import { dedupeByUrl, identityKey } from "./dedupe";
import { DEFAULT_TOP_N } from "./intent-weights";
import { rankByIntent, type Clock } from "./intent-rank";
import { keepAll } from "./judgment";
import { mixRoundRobin } from "./mix";
import type { JudgeItem, JudgmentResult, PostRecord, SourceResults } from "./types";

export interface SemanticFilter {
  judge(topic: string, items: JudgeItem[]): Promise<JudgmentResult[]>;
}

export type FetchSources = (queries: readonly string[], perQuery: number) => Promise<SourceResults>;

export interface PipelineLimits {
  topN: number;
  resultLimit: number;
  fallbackCount: number;
}

export const DEFAULT_LIMITS: PipelineLimits = {
  topN: DEFAULT_TOP_N,
  resultLimit: 15,
  fallbackCount: 3,
};

export interface SignalPipelineDeps {
  fetchSources: FetchSources;
  filter: SemanticFilter;
  now?: Clock;
  limits?: Partial<PipelineLimits>;
  logger?: Logger;
}

export interface FindRequest {
  topic: string;
  queries: string[];
  perQuery: number;
}

export type FilterOutcome = "judged" | "filter-failed" | "none-kept" | "skipped";

export interface PipelineStats {
  raw: number;
  unique: number;
  ranked: number;
  kept: number;
  returned: number;
  filter: FilterOutcome;
}

export interface PipelineResult {
  posts: PostRecord[];
  stats: PipelineStats;
}

export class SignalPipeline {
  private readonly fetchSources: FetchSources;
  private readonly filter: SemanticFilter;
  private readonly now: Clock;
  private readonly limits: PipelineLimits;
  private readonly log: Logger;

  constructor(deps: SignalPipelineDeps) {
    this.fetchSources = deps.fetchSources;
    this.filter = deps.filter;
    this.now = deps.now ?? Date.now;
    this.limits = { ...DEFAULT_LIMITS, ...deps.limits };
    this.log = (deps.logger ?? rootLog).child({ mod: "signal-pipeline" });
  }

  async find(req: FindRequest): Promise<PipelineResult> {
    const perSource = await this.fetchSources(req.queries, req.perQuery);
    const mixed = mixRoundRobin(perSource);
    const unique = dedupeByUrl(mixed);
    this.log.debug({ raw: mixed.length, unique: unique.length }, "[pipeline] fetched + deduped");

    if (!unique.length) {
      return { posts: [], stats: { raw: mixed.length, unique: 0, ranked: 0, kept: 0, returned: 0, filter: "skipped" } };
    }

    const ranked = rankByIntent(unique, req.queries, { topN: this.limits.topN, now: this.now });
    this.log.debug(
      { ranked: ranked.length, head: ranked.slice(0, 3).map((p) => `${p.source} - ${p.title.slice(0, 50)}`) },
      "[pipeline] ranked by intent"
    );

    const items: JudgeItem[] = ranked.map((p) => ({ title: p.title, snippet: p.snippet, url: p.url }));
    let judged: JudgmentResult[];
    let filter: FilterOutcome = "judged";
    try {
      judged = await this.filter.judge(req.topic, items);
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, "[pipeline] semantic filter failed; keeping all candidates");
      judged = keepAll(items);
      filter = "filter-failed";
    }

    const keep = new Set(judged.filter((j) => j.keep).map((j) => identityKey(j.url)));
    const kept = ranked.filter((p) => keep.has(identityKey(p.url)));
    this.log.debug({ judged: judged.length, kept: kept.length }, "[pipeline] filtered");

    const stats = { raw: mixed.length, unique: unique.length, ranked: ranked.length, kept: kept.length };
    if (!kept.length) {
      const posts = ranked.slice(0, this.limits.fallbackCount);
      this.log.info({ returned: posts.length }, "[pipeline] nothing passed the filter; returning heuristic top");
      return { posts, stats: { ...stats, returned: posts.length, filter: filter === "judged" ? "none-kept" : filter } };
    }

    const posts = kept.slice(0, this.limits.resultLimit);
    return { posts, stats: { ...stats, returned: posts.length, filter } };
  }
}
