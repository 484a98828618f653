import type { FastifyPluginAsync } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import { UpdateEntitlementsBodySchema } from "../validation.js";

const updateEntitlementsJsonSchema = zodToJsonSchema(UpdateEntitlementsBodySchema, { target: "openApi3" });

export const entitlementsRoutes: FastifyPluginAsync = async (app) => {
  // GET /api/entitlements
  app.get("/", {
    schema: {
      description: "Current subscription status and account creation time.",
      tags: ["Entitlements"],
    },
  }, async (_request, reply) => {
    return reply.code(200).send({ entitlements: app.entitlements.get() });
  });

  // PUT /api/entitlements
  app.put("/", {
    schema: {
      description: "Update subscription status or account creation time. Subscribers and new users bypass all limits.",
      tags: ["Entitlements"],
      body: updateEntitlementsJsonSchema,
    },
  }, async (request, reply) => {
    const parsed = UpdateEntitlementsBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid request body", details: parsed.error.issues });
    }

    const entitlements = app.entitlements.set(parsed.data);
    app.log.info({ entitlements }, "Entitlements updated");
    return reply.code(200).send({ entitlements });
  });
};
