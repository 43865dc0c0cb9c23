import { SOURCES, type PostRecord, type Source, type SourceResults } from "./types";

/**
 * Breadth-first interleave: index 0 of every source (in priority order),
 * then index 1, and so on. Exhausted sources just stop contributing.
 */
export function mixRoundRobin(
  results: SourceResults,
  order: readonly Source[] = SOURCES
): PostRecord[] {
  const lanes = order.map((s) => results[s] ?? []);
  const maxLen = lanes.reduce((m, lane) => Math.max(m, lane.length), 0);

  const mixed: PostRecord[] = [];
  for (let i = 0; i < maxLen; i++) {
    for (const lane of lanes) {
      if (i < lane.length) mixed.push(lane[i]);
    }
  }
  return mixed;
}
