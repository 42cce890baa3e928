import { apiReference } from "@scalar/hono-api-reference";
import type { OpenAPIHono } from "@hono/zod-openapi";

export interface OpenAPIConfig {
  title?: string;
  version?: string;
  description?: string;
  /** Public base URL, listed under `servers` */
  serverUrl?: string;
}

const TAGS = [
  { name: "Chat", description: "Send a message and receive the turn's events" },
  { name: "Sessions", description: "Conversation history and state per user and session" },
  { name: "Agents", description: "The agent hierarchy and the tools each agent holds" },
  { name: "Health", description: "Liveness" },
];

/** Serves the OpenAPI document at /doc and the Scalar reference UI at /reference */
export function configureOpenAPI(app: OpenAPIHono, config: OpenAPIConfig = {}) {
  const title = config.title ?? "Research Desk API";
  const info = {
    title,
    version: config.version ?? "0.1.0",
    description:
      config.description ??
      "Research-administration assistant. A coordinator agent routes each message to the database manager " +
        "or the research administrator and its funding agents; every turn is reported as a stream of events.",
  };

  app.doc("/doc", {
    openapi: "3.1.0",
    info,
    tags: TAGS,
    ...(config.serverUrl ? { servers: [{ url: config.serverUrl }] } : {}),
  });

  app.get(
    "/reference",
    apiReference({
      url: "/doc",
      theme: "kepler",
      layout: "modern",
      defaultHttpClient: { targetKey: "js", clientKey: "fetch" },
      pageTitle: `${title} - API Reference`,
    }),
  );
}
