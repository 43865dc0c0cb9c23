// src/config.ts
//
// Centralized, typed environment config. Read once at import time.

type NodeEnv = "development" | "production" | "test";
export type LlmProviderKind = "openai" | "openrouter" | "grok";

function envStr(name: string, fallback = ""): string {
  const v = process.env[name];
  return (v === undefined || v === "") ? fallback : String(v);
}
function envInt(name: string, fallback: number): number {
  const raw = envStr(name, "");
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? Math.trunc(n) : fallback;
}
function envFloat(name: string, fallback: number): number {
  const raw = envStr(name, "");
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}
function parseCsv(input: string): string[] {
  return input.split(",").map(s => s.trim()).filter(Boolean);
}
function oneOf<T extends string>(value: string, allowed: readonly T[], fallback: T): T {
  return allowed.find(a => a === value) ?? fallback;
}

export interface AppConfig {
  // server
  port: number;
  nodeEnv: NodeEnv;
  allowOrigins: string[]; // empty => "*"

  // language model
  llm: {
    provider: LlmProviderKind;
    apiKey?: string;
    baseURL?: string;
    model: string;
    temperature: number;
    maxTokens: number;
  };

  // Google Programmable Search
  cse: {
    key?: string;
    cxReddit?: string;
    cxLinkedIn?: string;
    cxX?: string;
    cxGeneral?: string;
  };

  // shared outbound HTTP pool
  http: {
    maxConnections: number;
    timeoutMs: number;
  };

  // pipeline knobs
  pipeline: {
    rankTopN: number;
    resultLimit: number;
    fallbackCount: number;
    defaultPerQuery: number;
    redditPerQueryMultiplier: number;
  };
}

const PROVIDER_KEY_ENV: Record<LlmProviderKind, string> = {
  openai: "OPENAI_API_KEY",
  openrouter: "OPENROUTER_API_KEY",
  grok: "XAI_API_KEY",
};

export function loadConfig(): AppConfig {
  const provider = oneOf(envStr("LLM_PROVIDER", "openai"), ["openai", "openrouter", "grok"] as const, "openai");
  return {
    port: envInt("PORT", 8000),
    nodeEnv: oneOf(envStr("NODE_ENV", "development"), ["development", "production", "test"] as const, "development"),
    allowOrigins: parseCsv(envStr("ALLOW_ORIGINS", "")),

    llm: {
      provider,
      apiKey: envStr(PROVIDER_KEY_ENV[provider]) || undefined,
      baseURL: envStr("LLM_BASE_URL") || undefined,
      model: envStr("LLM_MODEL", "gpt-4o-mini"),
      temperature: envFloat("LLM_TEMPERATURE", 0.2),
      maxTokens: envInt("LLM_MAX_TOKENS", 900),
    },

    cse: {
      key: envStr("GOOGLE_CSE_KEY") || undefined,
      cxReddit: envStr("GOOGLE_CSE_CX_REDDIT") || undefined,
      cxLinkedIn: envStr("GOOGLE_CSE_CX_LINKEDIN") || undefined,
      cxX: envStr("GOOGLE_CSE_CX_X") || undefined,
      cxGeneral: envStr("GOOGLE_CSE_CX_GENERAL") || undefined,
    },

    http: {
      maxConnections: Math.max(1, envInt("HTTP_MAX_CONNECTIONS", 100)),
      timeoutMs: Math.max(1000, envInt("HTTP_TIMEOUT_MS", 60_000)),
    },

    pipeline: {
      rankTopN: Math.max(1, envInt("RANK_TOP_N", 60)),
      resultLimit: Math.max(1, envInt("RESULT_LIMIT", 15)),
      fallbackCount: Math.max(0, envInt("FALLBACK_COUNT", 3)),
      defaultPerQuery: Math.max(1, envInt("DEFAULT_PER_QUERY", 6)),
      redditPerQueryMultiplier: Math.max(1, envInt("REDDIT_PER_QUERY_MULTIPLIER", 2)),
    },
  };
}

export const CFG: Readonly<AppConfig> = Object.freeze(loadConfig());

export function assertConfig(cfg: AppConfig = CFG) {
  const missing: string[] = [];
  if (!cfg.llm.apiKey) missing.push(`${PROVIDER_KEY_ENV[cfg.llm.provider]} (LLM_PROVIDER=${cfg.llm.provider})`);
  if (!cfg.cse.key) missing.push("GOOGLE_CSE_KEY");
  if (!cfg.cse.cxReddit && !cfg.cse.cxLinkedIn && !cfg.cse.cxX) {
    missing.push("At least one search engine id (GOOGLE_CSE_CX_REDDIT / GOOGLE_CSE_CX_LINKEDIN / GOOGLE_CSE_CX_X)");
  }
  if (missing.length) throw new Error("Config validation failed:\n- " + missing.join("\n- "));
}

export function summarizeForHealth(cfg: AppConfig = CFG) {
  return {
    nodeEnv: cfg.nodeEnv,
    llmProvider: cfg.llm.provider,
    llmModel: cfg.llm.model,
    hasLlmKey: Boolean(cfg.llm.apiKey),
    hasCseKey: Boolean(cfg.cse.key),
    sources: {
      reddit: Boolean(cfg.cse.cxReddit),
      linkedin: Boolean(cfg.cse.cxLinkedIn),
      x: Boolean(cfg.cse.cxX),
    },
    httpMaxConnections: cfg.http.maxConnections,
    rankTopN: cfg.pipeline.rankTopN,
    resultLimit: cfg.pipeline.resultLimit,
  };
}
