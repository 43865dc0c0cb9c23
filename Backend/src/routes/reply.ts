// src/routes/reply.ts
// Reply drafting for one selected post.
//   POST /reply         { topic, post } -> { response }
//   POST /reply/stream  { topic, post } -> SSE: data: <chunk> ... data: [DONE] | data: [ERROR] <msg>

import express, { type Response } from "express";
import type { IntentLLM } from "../ai/intent-llm";
import { log } from "../logger";
import { errorMessage } from "../shared/errors";
import { asyncRoute } from "./async";
import { fromWire, replySchema } from "./schemas";

function sseInit(res: Response) {
  res.status(200);
  res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no"); // nginx must not buffer
  res.flushHeaders();
}

/** One event; embedded newlines become extra `data:` lines. */
export function sseData(text: string): string {
  return text.split("\n").map((line) => `data: ${line}`).join("\n") + "\n\n";
}

export default function replyRouter(llm: IntentLLM) {
  const router = express.Router();

  router.post("/reply", asyncRoute(async (req, res) => {
    const { topic, post } = replySchema.parse(req.body);
    res.json({ response: await llm.draftReply(topic, fromWire(post)) });
  }));

  router.post("/reply/stream", asyncRoute(async (req, res) => {
    const { topic, post } = replySchema.parse(req.body);

    const ctrl = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) ctrl.abort();
    });

    sseInit(res);
    try {
      for await (const chunk of llm.draftReplyStream(topic, fromWire(post), ctrl.signal)) {
        res.write(sseData(chunk));
      }
      res.write(sseData("[DONE]"));
    } catch (err) {
      if (ctrl.signal.aborted) {
        log.debug({ url: post.url }, "[reply/stream] client went away");
      } else {
        log.warn({ err: errorMessage(err) }, "[reply/stream] failed");
        res.write(sseData(`[ERROR] ${errorMessage(err)}`));
      }
    } finally {
      res.end();
    }
  }));

  return router;
}
