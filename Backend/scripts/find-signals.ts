#!/usr/bin/env node
// Backend/scripts/find-signals.ts
// Runs one search through the full pipeline and prints the posts as JSON.
//
//   find-signals --topic "crm for agencies" --query "best crm" --query "hubspot alternative" [--per-query 6]

/* eslint-disable no-console */
import { parseFindArgs } from "../src/cli/find-args";
import { CFG, assertConfig } from "../src/config";
import { toWire } from "../src/routes/schemas";
import { buildServices } from "../src/services";
import { errorMessage } from "../src/shared/errors";

async function main() {
  const args = parseFindArgs(process.argv.slice(2), CFG.pipeline.defaultPerQuery);
  assertConfig(CFG);
  const { pool, pipeline } = buildServices(CFG);
  try {
    const { posts, stats } = await pipeline.find({ topic: args.topic, queries: args.queries, perQuery: args.perQuery });
    console.error(`[find-signals] raw=${stats.raw} unique=${stats.unique} ranked=${stats.ranked} kept=${stats.kept} filter=${stats.filter}`);
    console.log(JSON.stringify({ posts: posts.map(toWire) }, null, 2));
  } finally {
    pool.close();
  }
}

main().catch((err: unknown) => {
  console.error(`[find-signals] ${errorMessage(err)}`);
  process.exit(1);
});
