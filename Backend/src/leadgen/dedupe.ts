import type { PostRecord } from "./types";

/** URL up to the first "?", verbatim. Empty or malformed URLs are keys too. */
export function identityKey(url: string): string {
  const q = url.indexOf("?");
  return q === -1 ? url : url.slice(0, q);
}

export function dedupeByUrl(records: readonly PostRecord[]): PostRecord[] {
  const seen = new Set<string>();
  const out: PostRecord[] = [];
  for (const r of records) {
    const key = identityKey(r.url);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(r);
  }
  return out;
}
