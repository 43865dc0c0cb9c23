// Backend/src/index.ts
//
// Intent Finder API bootstrap: validate config, wire services, listen.

import { createApp } from "./app";
import { CFG, assertConfig, summarizeForHealth } from "./config";
import { log } from "./logger";
import { buildServices } from "./services";
import { enableGracefulShutdown, logProcessErrors } from "./shared/shutdown";

logProcessErrors();
assertConfig(CFG);

const { pool, llm, pipeline } = buildServices(CFG);

const app = createApp({
  llm,
  pipeline,
  defaultPerQuery: CFG.pipeline.defaultPerQuery,
  allowOrigins: CFG.allowOrigins,
  healthDetails: () => ({ config: summarizeForHealth(CFG), http: pool.stats() }),
});

const server = app.listen(CFG.port, () => {
  log.info({ port: CFG.port, provider: CFG.llm.provider, model: CFG.llm.model }, "[intent-finder] listening");
});

enableGracefulShutdown(server, { onClose: () => pool.close() });
