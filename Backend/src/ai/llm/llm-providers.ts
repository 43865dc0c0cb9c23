// src/ai/llm/llm-providers.ts
/**
 * Provider layer for OpenAI-compatible chat-completions APIs:
 *  - OpenAI (default, gpt-4o-mini)
 *  - OpenRouter
 *  - xAI Grok
 *
 * One normalized request/response type, non-stream + stream (async generator
 * of text deltas). All traffic goes through the shared HttpPool; no retries.
 */

import { z } from "zod";
import type { LlmProviderKind } from "../../config";
import type { HttpPool } from "../../ops/http-pool";
import { UpstreamError } from "../../shared/errors";

export type Role = "system" | "user" | "assistant";
export interface ChatMessage {
  role: Role;
  content: string;
}

export interface LLMRequest {
  messages: ChatMessage[];
  model?: string;
  max_tokens?: number;
  temperature?: number;
  /** Ask for `response_format: json_object`. */
  json?: boolean;
}

export interface LLMUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

export interface LLMResponse {
  provider: string;
  model: string;
  content: string;
  finish_reason?: string;
  usage?: LLMUsage;
}

export interface LLMProvider {
  readonly name: string;
  call(req: LLMRequest): Promise<LLMResponse>;
  stream(req: LLMRequest, signal?: AbortSignal): AsyncGenerator<string, void, void>;
}

export interface ModelDefaults {
  model: string;
  temperature: number;
  maxTokens: number;
}

const BASE_URLS: Record<LlmProviderKind, string> = {
  openai: "https://api.openai.com/v1",
  openrouter: "https://openrouter.ai/api/v1",
  grok: "https://api.x.ai/v1",
};

const DEFAULTS: ModelDefaults = { model: "gpt-4o-mini", temperature: 0.2, maxTokens: 900 };

/* ---------------- wire shapes ---------------- */

const usageSchema = z.object({
  prompt_tokens: z.number().optional(),
  completion_tokens: z.number().optional(),
  total_tokens: z.number().optional(),
});

const completionSchema = z.object({
  output_text: z.string().nullish(),
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullish() }).partial().nullish(),
    finish_reason: z.string().nullish(),
  })).nullish(),
  usage: usageSchema.nullish(),
});

const streamChunkSchema = z.object({
  choices: z.array(z.object({
    delta: z.object({ content: z.string().nullish() }).partial().nullish(),
  })).nullish(),
});

/** `data: {...}` -> delta text; null for anything that carries no text. */
export function parseStreamLine(line: string): string | "[DONE]" | null {
  const m = line.match(/^data:\s?(.*)$/);
  if (!m) return null;
  const data = m[1].trim();
  if (data === "[DONE]") return "[DONE]";
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return null; // keep-alives, proxies' plain text
  }
  const chunk = streamChunkSchema.safeParse(json);
  if (!chunk.success) return null;
  const content = chunk.data.choices?.[0]?.delta?.content;
  return content ? content : null;
}

/* ---------------- provider ---------------- */

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name: LlmProviderKind;
  private readonly baseURL: string;
  private readonly defaults: ModelDefaults;

  constructor(
    private readonly pool: HttpPool,
    private readonly apiKey: string | undefined,
    opts: { kind?: LlmProviderKind; baseURL?: string; defaults?: Partial<ModelDefaults> } = {}
  ) {
    this.name = opts.kind ?? "openai";
    this.baseURL = (opts.baseURL || BASE_URLS[this.name]).replace(/\/+$/, "");
    this.defaults = { ...DEFAULTS, ...opts.defaults };
  }

  private url() {
    return `${this.baseURL}/chat/completions`;
  }

  private headers(): Record<string, string> {
    return {
      "Authorization": `Bearer ${this.apiKey ?? ""}`,
      "Content-Type": "application/json",
    };
  }

  private payload(req: LLMRequest, stream: boolean) {
    return {
      model: req.model ?? this.defaults.model,
      temperature: req.temperature ?? this.defaults.temperature,
      max_tokens: req.max_tokens ?? this.defaults.maxTokens,
      messages: req.messages,
      ...(req.json ? { response_format: { type: "json_object" } } : {}),
      ...(stream ? { stream: true } : {}),
    };
  }

  async call(req: LLMRequest): Promise<LLMResponse> {
    const body = this.payload(req, false);
    const json = await this.pool.json(this.url(), {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify(body),
    });

    const parsed = completionSchema.safeParse(json);
    if (!parsed.success) {
      throw new UpstreamError(`${this.name}: unexpected completion shape`, undefined, this.url());
    }
    const choice = parsed.data.choices?.[0];
    return {
      provider: this.name,
      model: body.model,
      content: parsed.data.output_text || choice?.message?.content || "",
      finish_reason: choice?.finish_reason ?? undefined,
      usage: parsed.data.usage ?? undefined,
    };
  }

  async *stream(req: LLMRequest, signal?: AbortSignal): AsyncGenerator<string, void, void> {
    const lines = this.pool.lines(this.url(), {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify(this.payload(req, true)),
      signal,
    });
    for await (const line of lines) {
      const delta = parseStreamLine(line);
      if (delta === "[DONE]") return;
      if (delta) yield delta;
    }
  }
}

/* ---------------- registry ---------------- */

export interface ProviderInit {
  kind: LlmProviderKind;
  apiKey?: string;
  baseURL?: string;
  defaults?: Partial<ModelDefaults>;
}

export function buildProvider(init: ProviderInit, pool: HttpPool): LLMProvider {
  return new OpenAICompatibleProvider(pool, init.apiKey, {
    kind: init.kind,
    baseURL: init.baseURL,
    defaults: init.defaults,
  });
}
