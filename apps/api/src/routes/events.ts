import type { FastifyPluginAsync } from "fastify";
import { CooldownExpiredQuerySchema } from "../validation.js";

export const eventsRoutes: FastifyPluginAsync = async (app) => {
  // GET /api/events/cooldown-expired
  app.get("/cooldown-expired", {
    schema: {
      description:
        "Long-poll for the next cooldown expiry. Responds 200 with the event, or 204 when timeoutMs passes first.",
      tags: ["Events"],
      querystring: {
        type: "object",
        properties: {
          timeoutMs: { type: "integer", minimum: 0, maximum: 60000 },
          featureKey: { type: "string" },
        },
      },
    },
  }, async (request, reply) => {
    const parsed = CooldownExpiredQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid query", details: parsed.error.issues });
    }

    const controller = new AbortController();
    const onClose = () => controller.abort();
    reply.raw.once("close", onClose);
    try {
      const event = await app.notifier.waitForExpiry({ ...parsed.data, signal: controller.signal });
      if (!event) return reply.code(204).send();
      return reply.code(200).send({ event });
    } finally {
      reply.raw.off("close", onClose);
    }
  });
};
