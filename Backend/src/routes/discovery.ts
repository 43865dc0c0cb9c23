// src/routes/discovery.ts
// Product understanding: description/segment/pain points, GTM topics, search keywords.
//   POST /extract     { url }                 -> { description, customer_segment, pain_points }
//   POST /gtm-topics  { description }         -> { topics }
//   POST /keywords    { topic, description }  -> { queries }

import express from "express";
import type { IntentLLM } from "../ai/intent-llm";
import { asyncRoute } from "./async";
import { MANUAL_PREFIX, extractSchema, gtmSchema, keywordsSchema } from "./schemas";

export default function discoveryRouter(llm: IntentLLM) {
  const router = express.Router();

  router.post("/extract", asyncRoute(async (req, res) => {
    const { url } = extractSchema.parse(req.body);
    const description = url.startsWith(MANUAL_PREFIX)
      ? url.slice(MANUAL_PREFIX.length)
      : await llm.describeWebsite(url);

    const [customer_segment, pain_points] = await Promise.all([
      llm.analyzeCustomerSegment(description),
      llm.extractPainPoints(description),
    ]);
    res.json({ description, customer_segment, pain_points });
  }));

  router.post("/gtm-topics", asyncRoute(async (req, res) => {
    const { description } = gtmSchema.parse(req.body);
    res.json({ topics: await llm.generateGtmTopics(description) });
  }));

  router.post("/keywords", asyncRoute(async (req, res) => {
    const { topic, description } = keywordsSchema.parse(req.body);
    res.json({ queries: await llm.generateSearchKeywords(topic, description) });
  }));

  return router;
}
