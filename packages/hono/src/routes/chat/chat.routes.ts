import { OpenAPIHono, z } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import { collectTurn, streamTurnEvents } from "@resdesk/core";
import type { Engine } from "@resdesk/core";

export const chatRequestSchema = z.object({
  userId: z.string().min(1).openapi({ example: "alice" }),
  sessionId: z.string().min(1).openapi({ example: "s1" }),
  message: z.string().min(1).openapi({ example: "List all active projects" }),
  role: z.string().min(1).optional().openapi({
    description: "Role stored on the session when this message creates it",
    example: "investigator",
  }),
});

const eventSchema = z
  .object({ type: z.enum(["text", "toolStarted", "toolFinished", "delegated", "returned", "error"]) })
  .passthrough();

const chatResponseSchema = z.object({
  response: z.string().nullable().openapi({ description: "Final text of the root agent, or null when the turn failed" }),
  events: z.array(eventSchema),
  sessionId: z.string(),
});

const errorSchema = z.object({ error: z.string(), issues: z.array(z.string()).optional() });

export function createChatRoutes(engine: Engine) {
  const router = new OpenAPIHono();

  router.openAPIRegistry.registerPath({
    method: "post",
    path: "/",
    tags: ["Chat"],
    summary: "Send a message",
    description:
      "Runs one turn. Streams the turn's events as SSE (event name = event type, data = JSON event) " +
      "unless ?format=json is given, which returns the collected events.",
    request: {
      query: z.object({ format: z.enum(["sse", "json"]).optional() }),
      body: { content: { "application/json": { schema: chatRequestSchema } } },
    },
    responses: {
      200: {
        description: "Turn events",
        content: {
          "text/event-stream": { schema: z.string() },
          "application/json": { schema: chatResponseSchema },
        },
      },
      400: { description: "Invalid request body", content: { "application/json": { schema: errorSchema } } },
    },
  });

  router.post("/", async (c) => {
    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch (err: unknown) {
      throw new HTTPException(400, { message: "Malformed JSON in request body", cause: err });
    }

    const parsed = chatRequestSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      return c.json({ error: "Invalid request body", issues }, 400);
    }

    const signal = c.req.raw.signal;
    const events = engine.runTurn(parsed.data, { abortSignal: signal });

    if (c.req.query("format") === "json") {
      const { response, events: collected } = await collectTurn(events);
      return c.json({ response, events: collected, sessionId: parsed.data.sessionId }, 200);
    }
    return streamTurnEvents(events, signal);
  });

  return router;
}
