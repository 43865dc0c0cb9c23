// src/services.ts
// One place that turns config into live collaborators. Used by the API bootstrap and the CLI.

import { IntentLLM } from "./ai/intent-llm";
import { buildProvider } from "./ai/llm/llm-providers";
import type { AppConfig } from "./config";
import { lookupWebsite, makeSourceFetchers, searchAllSources } from "./connectors/cse";
import { SignalPipeline } from "./leadgen/signal-pipeline";
import { HttpPool, type FetchLike } from "./ops/http-pool";

export interface Services {
  pool: HttpPool;
  llm: IntentLLM;
  pipeline: SignalPipeline;
}

export function buildServices(cfg: AppConfig, fetchImpl?: FetchLike): Services {
  const pool = new HttpPool({
    maxConnections: cfg.http.maxConnections,
    timeoutMs: cfg.http.timeoutMs,
    fetchImpl,
  });

  const provider = buildProvider(
    {
      kind: cfg.llm.provider,
      apiKey: cfg.llm.apiKey,
      baseURL: cfg.llm.baseURL,
      defaults: { model: cfg.llm.model, temperature: cfg.llm.temperature, maxTokens: cfg.llm.maxTokens },
    },
    pool
  );
  const llm = new IntentLLM(provider, (url) => lookupWebsite(pool, cfg.cse, url));

  const fetchers = makeSourceFetchers(pool, cfg.cse);
  const pipeline = new SignalPipeline({
    fetchSources: (queries, perQuery) =>
      searchAllSources(fetchers, queries, perQuery, cfg.pipeline.redditPerQueryMultiplier),
    filter: llm,
    limits: {
      topN: cfg.pipeline.rankTopN,
      resultLimit: cfg.pipeline.resultLimit,
      fallbackCount: cfg.pipeline.fallbackCount,
    },
  });

  return { pool, llm, pipeline };
}
