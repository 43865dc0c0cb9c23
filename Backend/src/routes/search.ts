// src/routes/search.ts
//   POST /search { topic, queries, per_query? } -> { posts }

import express from "express";
import type { SignalPipeline } from "../leadgen/signal-pipeline";
import { log } from "../logger";
import { asyncRoute } from "./async";
import { searchSchema, toWire } from "./schemas";

export default function searchRouter(pipeline: SignalPipeline, defaultPerQuery: number) {
  const router = express.Router();
  const schema = searchSchema(defaultPerQuery);

  router.post("/search", asyncRoute(async (req, res) => {
    const body = schema.parse(req.body);
    const { posts, stats } = await pipeline.find({
      topic: body.topic,
      queries: body.queries,
      perQuery: body.per_query,
    });
    log.info({ topic: body.topic, ...stats }, "[search] done");
    res.json({ posts: posts.map(toWire) });
  }));

  return router;
}
