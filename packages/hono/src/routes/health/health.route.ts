import { createRoute, z } from "@hono/zod-openapi";
import { OpenAPIHono } from "@hono/zod-openapi";
import { walkHierarchy } from "@resdesk/core";
import type { Engine } from "@resdesk/core";

export function createHealthRoutes(engine: Engine) {
  const router = new OpenAPIHono();
  const agentCount = [...walkHierarchy(engine.root)].length;

  router.openapi(
    createRoute({
      method: "get",
      path: "/",
      tags: ["Health"],
      summary: "Health check",
      responses: {
        200: {
          description: "Server is healthy",
          content: {
            "application/json": {
              schema: z.object({
                status: z.string(),
                agent: z.string().openapi({ description: "Name of the root agent" }),
                agents: z.number(),
                capabilities: z.number(),
                timestamp: z.string(),
              }),
            },
          },
        },
      },
    }),
    (c) => {
      return c.json({
        status: "ok",
        agent: engine.root.name,
        agents: agentCount,
        capabilities: engine.registry.list().length,
        timestamp: new Date().toISOString(),
      }, 200);
    },
  );

  return router;
}
