// Backend/src/connectors/cse.ts
// Google Programmable Search (CSE) connector
// - one search engine id (cx) per platform: reddit / linkedin / x (+ a general one)
// - normalizes hits into PostRecords, with a best-effort publish time from page metatags
// - website lookup used to describe a product from its URL

import { z } from 'zod';
import { log } from '../logger';
import type { HttpPool } from '../ops/http-pool';
import { errorMessage } from '../shared/errors';
import type { PostRecord, Source, SourceResults } from '../leadgen/types';

const CSE_URL = 'https://www.googleapis.com/customsearch/v1';
const CSE_PAGE_MAX = 10; // API hard limit for `num`
const PUBLISHED_META_KEYS = ['article:published_time', 'og:updated_time', 'article:modified_time'];

const clog = log.child({ mod: 'cse' });

export interface CseConfig {
  key?: string;
  cxReddit?: string;
  cxLinkedIn?: string;
  cxX?: string;
  cxGeneral?: string;
}

export type CseSearchParams = {
  key: string;
  cx: string;
  q: string;
  num?: number;
  start?: number;
};

const itemSchema = z.object({
  title: z.string().nullish(),
  link: z.string().nullish(),
  snippet: z.string().nullish(),
  pagemap: z.object({
    metatags: z.array(z.record(z.unknown())).nullish(),
  }).nullish(),
});
type CseItem = z.infer<typeof itemSchema>;

const responseSchema = z.object({
  items: z.array(z.unknown()).nullish(),
});

function readItems(data: unknown): CseItem[] {
  const parsed = responseSchema.safeParse(data);
  if (!parsed.success) return [];
  const out: CseItem[] = [];
  for (const raw of parsed.data.items ?? []) {
    const it = itemSchema.safeParse(raw);
    if (it.success) out.push(it.data);
  }
  return out;
}

function publishedAt(it: CseItem): string | undefined {
  const meta = it.pagemap?.metatags?.[0];
  if (!meta) return undefined;
  for (const k of PUBLISHED_META_KEYS) {
    const v = meta[k];
    if (typeof v === 'string' && v.trim()) return v.trim();
  }
  return undefined;
}

export async function cseSearch(pool: HttpPool, p: CseSearchParams): Promise<unknown> {
  const params = new URLSearchParams({
    key: p.key,
    cx: p.cx,
    q: p.q,
    num: String(Math.max(1, Math.min(CSE_PAGE_MAX, p.num ?? CSE_PAGE_MAX))),
    start: String(Math.max(1, p.start ?? 1)),
  });
  return pool.json(`${CSE_URL}?${params.toString()}`);
}

export function normalizeCseItems(source: Source, data: unknown): PostRecord[] {
  return readItems(data).map((it) => {
    const rec: PostRecord = {
      source,
      title: it.title || '',
      url: it.link || '',
      snippet: it.snippet || '',
    };
    const ts = publishedAt(it);
    if (ts) rec.timestamp = ts;
    return rec;
  });
}

/** Up to `count` hits for one query, paging past the 10-per-call cap. */
export async function cseSearchMany(
  pool: HttpPool,
  source: Source,
  p: Omit<CseSearchParams, 'num' | 'start'> & { count: number }
): Promise<PostRecord[]> {
  const out: PostRecord[] = [];
  let start = 1;
  while (out.length < p.count) {
    const num = Math.min(CSE_PAGE_MAX, p.count - out.length);
    const page = normalizeCseItems(source, await cseSearch(pool, { key: p.key, cx: p.cx, q: p.q, num, start }));
    out.push(...page);
    if (page.length < num) break; // engine ran dry
    start += num;
  }
  return out.slice(0, p.count);
}

/* ---------------- per-source fetchers ---------------- */

export type SourceFetcher = (queries: readonly string[], perQuery: number) => Promise<PostRecord[]>;
export type SourceFetchers = Record<Source, SourceFetcher>;

/** Queries run one after another; an unconfigured source yields nothing. */
export function makeCseFetcher(pool: HttpPool, source: Source, key?: string, cx?: string): SourceFetcher {
  return async (queries, perQuery) => {
    if (!key || !cx) return [];
    const all: PostRecord[] = [];
    for (const q of queries) {
      all.push(...await cseSearchMany(pool, source, { key, cx, q, count: perQuery }));
    }
    clog.debug({ source, queries: queries.length, hits: all.length }, '[cse] source done');
    return all;
  };
}

export function makeSourceFetchers(pool: HttpPool, cfg: CseConfig): SourceFetchers {
  return {
    reddit: makeCseFetcher(pool, 'reddit', cfg.key, cfg.cxReddit),
    linkedin: makeCseFetcher(pool, 'linkedin', cfg.key, cfg.cxLinkedIn),
    x: makeCseFetcher(pool, 'x', cfg.key, cfg.cxX),
  };
}

/**
 * All sources at once (they don't depend on each other). Reddit gets
 * `redditMultiplier`x the per-query budget: its threads carry the most intent.
 */
export async function searchAllSources(
  fetchers: SourceFetchers,
  queries: readonly string[],
  perQuery: number,
  redditMultiplier = 2
): Promise<SourceResults> {
  const [reddit, linkedin, x] = await Promise.all([
    fetchers.reddit(queries, perQuery * redditMultiplier),
    fetchers.linkedin(queries, perQuery),
    fetchers.x(queries, perQuery),
  ]);
  return { reddit, linkedin, x };
}

/* ---------------- website lookup ---------------- */

export function domainOf(url: string): string {
  return url
    .trim()
    .replace(/^https?:\/\//i, '')
    .replace(/^www\./i, '')
    .split('/')[0];
}

/**
 * A few "title: snippet" lines about the site, or null when there is no
 * usable engine, nothing was found, or the search failed (caller falls back
 * to the model's own knowledge).
 */
export async function lookupWebsite(pool: HttpPool, cfg: CseConfig, url: string): Promise<string | null> {
  const domain = domainOf(url);
  const cx = cfg.cxGeneral || cfg.cxLinkedIn;
  if (!cfg.key || !cx || !domain) return null;

  const q = cfg.cxGeneral
    ? `"${domain}" company "what does" OR "about" OR "services"`
    : `${domain} company about`;

  try {
    const items = readItems(await cseSearch(pool, { key: cfg.key, cx, q, num: 3 }));
    const lines = items
      .slice(0, 3)
      .filter((it) => it.snippet)
      .map((it) => `${it.title || ''}: ${it.snippet}`);
    return lines.length ? lines.join('\n') : null;
  } catch (err) {
    clog.warn({ domain, err: errorMessage(err) }, '[cse] website lookup failed; using model knowledge');
    return null;
  }
}
