// src/routes/schemas.ts
// Request bodies + wire shape of a post. The wire keeps the `ts` field name.

import { z } from "zod";
import { SOURCES, type PostRecord } from "../leadgen/types";

export const wirePostSchema = z.object({
  source: z.enum(SOURCES),
  title: z.string(),
  url: z.string(),
  snippet: z.string(),
  ts: z.string().nullish(),
});
export type WirePost = z.infer<typeof wirePostSchema>;

export const extractSchema = z.object({ url: z.string().trim().min(1) });
export const gtmSchema = z.object({ description: z.string().trim().min(1) });
export const keywordsSchema = z.object({
  topic: z.string().trim().min(1),
  description: z.string().trim().min(1),
});

export function searchSchema(defaultPerQuery: number) {
  return z.object({
    topic: z.string().trim().min(1),
    queries: z.array(z.string()).max(20),
    per_query: z.number().int().min(1).max(50).default(defaultPerQuery),
  });
}

export const replySchema = z.object({
  topic: z.string().trim().min(1),
  post: wirePostSchema,
});

export const MANUAL_PREFIX = "manual:";

export function toWire(p: PostRecord): WirePost {
  const out: WirePost = { source: p.source, title: p.title, url: p.url, snippet: p.snippet };
  if (p.timestamp) out.ts = p.timestamp;
  return out;
}

export function fromWire(p: WirePost): PostRecord {
  const out: PostRecord = { source: p.source, title: p.title, url: p.url, snippet: p.snippet };
  if (p.ts) out.timestamp = p.ts;
  return out;
}
