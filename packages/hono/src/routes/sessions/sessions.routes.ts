import { createRoute, z } from "@hono/zod-openapi";
import { OpenAPIHono } from "@hono/zod-openapi";
import { describeSessionKey } from "@resdesk/core";
import type { Engine } from "@resdesk/core";

const sessionParams = z.object({
  userId: z.string().min(1).openapi({ example: "alice" }),
  sessionId: z.string().min(1).openapi({ example: "s1" }),
});

const turnSchema = z.object({
  seq: z.number(),
  actor: z.string(),
  payload: z.record(z.unknown()),
  timestamp: z.string(),
});

const sessionSchema = z.object({
  key: z.object({ appName: z.string(), userId: z.string(), sessionId: z.string() }),
  state: z.record(z.unknown()),
  history: z.array(turnSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const notFoundSchema = z.object({ error: z.string() });

export function createSessionsRoutes(engine: Engine) {
  const router = new OpenAPIHono();
  const store = engine.storage.sessions;
  const keyOf = (params: z.infer<typeof sessionParams>) => ({ appName: engine.appName, ...params });

  router.openapi(
    createRoute({
      method: "get", path: "/{userId}", tags: ["Sessions"], summary: "List a user's sessions",
      request: { params: z.object({ userId: z.string().min(1).openapi({ example: "alice" }) }) },
      responses: {
        200: {
          description: "Session summaries",
          content: {
            "application/json": {
              schema: z.object({
                sessions: z.array(z.object({ sessionId: z.string(), userId: z.string(), turnCount: z.number(), updatedAt: z.string() })),
                count: z.number(),
              }),
            },
          },
        },
      },
    }),
    async (c) => {
      const { userId } = c.req.valid("param");
      const sessions = await store.list(engine.appName, userId);
      return c.json({ sessions, count: sessions.length }, 200);
    },
  );

  router.openapi(
    createRoute({
      method: "get", path: "/{userId}/{sessionId}", tags: ["Sessions"], summary: "Get a session with its state and history",
      request: { params: sessionParams },
      responses: {
        200: { description: "Full session", content: { "application/json": { schema: sessionSchema } } },
        404: { description: "Session not found", content: { "application/json": { schema: notFoundSchema } } },
      },
    }),
    async (c) => {
      const session = await store.get(keyOf(c.req.valid("param")));
      if (!session) return c.json({ error: "Session not found" }, 404);
      return c.json(session, 200);
    },
  );

  router.openapi(
    createRoute({
      method: "delete", path: "/{userId}/{sessionId}", tags: ["Sessions"], summary: "Delete a session",
      request: { params: sessionParams },
      responses: {
        200: { description: "Session deleted", content: { "application/json": { schema: z.object({ deleted: z.literal(true), sessionId: z.string() }) } } },
        404: { description: "Session not found", content: { "application/json": { schema: notFoundSchema } } },
      },
    }),
    async (c) => {
      const key = keyOf(c.req.valid("param"));
      if (!(await engine.deleteSession(key))) return c.json({ error: "Session not found" }, 404);
      console.log(`[research-desk] Deleted session ${describeSessionKey(key)}`);
      return c.json({ deleted: true as const, sessionId: key.sessionId }, 200);
    },
  );

  return router;
}
