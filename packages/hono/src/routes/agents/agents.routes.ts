import { createRoute, z } from "@hono/zod-openapi";
import { OpenAPIHono } from "@hono/zod-openapi";
import { describeHierarchy } from "@resdesk/core";
import type { Engine } from "@resdesk/core";

const agentSchema = z.object({
  name: z.string(),
  description: z.string(),
  tools: z.array(z.string()),
  outputKey: z.string().optional(),
  parent: z.string().nullable(),
  children: z.array(z.string()),
});

export function createAgentsRoutes(engine: Engine) {
  const router = new OpenAPIHono();
  const agents = describeHierarchy(engine.root);

  router.openapi(
    createRoute({
      method: "get",
      path: "/",
      tags: ["Agents"],
      summary: "List the agent hierarchy",
      description: "Every agent node with its tools and children, root first",
      responses: {
        200: {
          description: "Agent hierarchy",
          content: {
            "application/json": {
              schema: z.object({ root: z.string(), agents: z.array(agentSchema), count: z.number() }),
            },
          },
        },
      },
    }),
    (c) => c.json({ root: engine.root.name, agents, count: agents.length }, 200),
  );

  router.openapi(
    createRoute({
      method: "get",
      path: "/{agentName}",
      tags: ["Agents"],
      summary: "Get an agent",
      request: {
        params: z.object({ agentName: z.string().openapi({ example: "database_manager_agent" }) }),
      },
      responses: {
        200: { description: "Agent details", content: { "application/json": { schema: agentSchema } } },
        404: { description: "Agent not found", content: { "application/json": { schema: z.object({ error: z.string() }) } } },
      },
    }),
    (c) => {
      const { agentName } = c.req.valid("param");
      const agent = agents.find((a) => a.name === agentName);
      if (!agent) return c.json({ error: `Agent not found: ${agentName}` }, 404);
      return c.json(agent, 200);
    },
  );

  return router;
}
