import { OpenAPIHono } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import { createAiOracle, createEngine, createMemoryStorage, walkHierarchy } from "@resdesk/core";
import { createMemoryRecordStore, createResearchHierarchy } from "@resdesk/research";
import type { ResearchPluginConfig, ResearchPluginInstance } from "./types.js";
import { configureOpenAPI } from "./lib/configure-openapi.js";

// Route factories
import { createHealthRoutes } from "./routes/health/health.route.js";
import { createChatRoutes } from "./routes/chat/chat.routes.js";
import { createSessionsRoutes } from "./routes/sessions/sessions.routes.js";
import { createAgentsRoutes } from "./routes/agents/agents.routes.js";

export function createResearchPlugin(config: ResearchPluginConfig): ResearchPluginInstance {
  const oracle = config.oracle ?? (config.model ? createAiOracle({ model: config.model }) : undefined);
  if (!oracle) {
    throw new Error("createResearchPlugin needs either a model or an oracle");
  }

  const storage = config.storage ?? (() => {
    console.log("[research-desk] Using in-memory session storage (data will not persist across restarts)");
    return createMemoryStorage();
  })();

  const records = config.records ?? (() => {
    console.log("[research-desk] Using in-memory record storage (data will not persist across restarts)");
    return createMemoryRecordStore();
  })();

  const engine = createEngine({
    root: createResearchHierarchy({ records, funding: config.funding }),
    oracle,
    storage,
    appName: config.appName,
    maxSteps: config.maxSteps,
  });

  const app = new OpenAPIHono();

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }
    console.error("[research-desk] Unhandled error:", err);
    return c.json({ error: "Internal Server Error" }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: "Not Found" }, 404);
  });

  app.route("/health", createHealthRoutes(engine));
  app.route("/chat", createChatRoutes(engine));
  app.route("/sessions", createSessionsRoutes(engine));
  app.route("/agents", createAgentsRoutes(engine));

  configureOpenAPI(app, config.openapi);

  console.log(
    `[research-desk] Initialized: ${[...walkHierarchy(engine.root)].length} agents, ` +
      `${engine.registry.list().length} capabilities`,
  );

  return { app, engine, records };
}
