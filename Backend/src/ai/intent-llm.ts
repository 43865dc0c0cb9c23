// src/ai/intent-llm.ts
/**
 * Model-backed tasks of the intent finder: product description, customer
 * segment, pain points, GTM topics, search keywords, the semantic post filter
 * and reply drafting (plain + streamed).
 */

import { z } from "zod";
import { log as rootLog, type Logger } from "../logger";
import { judgmentsOrKeepAll, parseJudgments } from "../leadgen/judgment";
import type { SemanticFilter } from "../leadgen/signal-pipeline";
import type { JudgeItem, JudgmentResult } from "../leadgen/types";
import type { LLMProvider, LLMRequest } from "./llm/llm-providers";
import {
  customerSegmentPrompt,
  describeFromKnowledgePrompt,
  describeFromSearchPrompt,
  gtmTopicsPrompt,
  judgePostsPrompt,
  painPointsPrompt,
  replyPrompt,
  searchKeywordsPrompt,
  type PostForReply,
} from "./prompts";

export type WebsiteLookup = (url: string) => Promise<string | null>;

const JUDGE_MAX_TOKENS = 1500;

const unknownList = z.array(z.unknown());

function strings(value: unknown): string[] | null {
  const parsed = unknownList.safeParse(value);
  if (!parsed.success) return null;
  return parsed.data
    .filter((v): v is string => typeof v === "string")
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * JSON string list out of a model reply: a bare array (when allowed) or the
 * first of `keys` holding an array. Anything unreadable is an empty list.
 */
export function parseStringList(text: string, keys: readonly string[], allowBareArray = true): string[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return [];
  }
  if (Array.isArray(data)) return allowBareArray ? strings(data) ?? [] : [];
  if (typeof data !== "object" || data === null) return [];
  const obj = new Map(Object.entries(data));
  for (const k of keys) {
    if (!obj.has(k)) continue;
    return strings(obj.get(k)) ?? [];
  }
  return [];
}

export class IntentLLM implements SemanticFilter {
  private readonly log: Logger;

  constructor(
    private readonly provider: LLMProvider,
    private readonly lookupWebsite: WebsiteLookup = async () => null,
    logger?: Logger
  ) {
    this.log = (logger ?? rootLog).child({ mod: "intent-llm" });
  }

  private async text(req: LLMRequest): Promise<string> {
    const res = await this.provider.call(req);
    return res.content;
  }

  async describeWebsite(url: string): Promise<string> {
    const info = await this.lookupWebsite(url);
    const messages = info ? describeFromSearchPrompt(url, info) : describeFromKnowledgePrompt(url);
    return this.text({ messages });
  }

  analyzeCustomerSegment(description: string): Promise<string> {
    return this.text({ messages: customerSegmentPrompt(description) });
  }

  async extractPainPoints(description: string): Promise<string[]> {
    const raw = await this.text({ messages: painPointsPrompt(description), json: true });
    return parseStringList(raw, ["pain_points", "points", "items"]);
  }

  async generateGtmTopics(description: string): Promise<string[]> {
    const raw = await this.text({ messages: gtmTopicsPrompt(description), json: true });
    return parseStringList(raw, ["topics"]);
  }

  async generateSearchKeywords(topic: string, description: string): Promise<string[]> {
    const raw = await this.text({ messages: searchKeywordsPrompt(topic, description), json: true });
    return parseStringList(raw, ["queries"], false);
  }

  /** Semantic filter. A reply we can't read keeps every item. */
  async judge(topic: string, items: JudgeItem[]): Promise<JudgmentResult[]> {
    if (!items.length) return [];
    const raw = await this.text({
      messages: judgePostsPrompt(topic, items),
      json: true,
      max_tokens: JUDGE_MAX_TOKENS,
    });
    const parsed = parseJudgments(raw);
    if (parsed.kind === "invalid") {
      this.log.warn({ err: parsed.error, items: items.length }, "[judge] unreadable filter reply; keeping all");
    } else if (parsed.kind === "unrecognized") {
      this.log.warn({ items: items.length }, "[judge] filter reply in unknown shape; no verdicts");
    }
    return judgmentsOrKeepAll(parsed, items);
  }

  draftReply(topic: string, post: PostForReply): Promise<string> {
    return this.text({ messages: replyPrompt(topic, post) });
  }

  draftReplyStream(topic: string, post: PostForReply, signal?: AbortSignal): AsyncGenerator<string, void, void> {
    return this.provider.stream({ messages: replyPrompt(topic, post) }, signal);
  }
}
