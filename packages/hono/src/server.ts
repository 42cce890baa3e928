import { serve } from "@hono/node-server";
import { createFileStorage } from "@resdesk/core";
import { createFileRecordStore } from "@resdesk/research";
import { loadConfig } from "./config.js";
import { createModel } from "./lib/create-model.js";
import { createResearchPlugin } from "./plugin.js";

const config = loadConfig();

const { app } = createResearchPlugin({
  model: createModel(config.llm),
  storage: config.dataDir ? createFileStorage({ dataDir: config.dataDir }) : undefined,
  records: config.dataDir ? createFileRecordStore({ dataDir: config.dataDir }) : undefined,
  funding: { apiUrl: config.grantsApiUrl },
  appName: config.appName,
  maxSteps: config.maxSteps,
});

serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  console.log(`[research-desk] ${config.llm.provider}/${config.llm.model} listening on http://${info.address}:${info.port}`);
});
