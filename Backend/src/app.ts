// src/app.ts
// Express app factory. Collaborators come in from the caller (index.ts or tests).

import express from "express";
import cors from "cors";
import type { IntentLLM } from "./ai/intent-llm";
import type { SignalPipeline } from "./leadgen/signal-pipeline";
import { errorHandler, notFound } from "./middleware/errors";
import discoveryRouter from "./routes/discovery";
import healthRouter from "./routes/health";
import replyRouter from "./routes/reply";
import searchRouter from "./routes/search";

export interface AppDeps {
  llm: IntentLLM;
  pipeline: SignalPipeline;
  defaultPerQuery: number;
  allowOrigins?: string[];   // empty/undefined => "*"
  healthDetails?: () => unknown;
}

export function createApp(deps: AppDeps) {
  const app = express();

  const origins = deps.allowOrigins?.length ? deps.allowOrigins : "*";
  app.use(cors({ origin: origins, credentials: origins !== "*" }));
  app.use(express.json({ limit: "1mb" }));

  app.use(healthRouter(deps.healthDetails));
  app.use(discoveryRouter(deps.llm));
  app.use(searchRouter(deps.pipeline, deps.defaultPerQuery));
  app.use(replyRouter(deps.llm));

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
