import type { FastifyPluginAsync } from "fastify";
import { zodToJsonSchema } from "zod-to-json-schema";
import { limitSettingsFromRemote } from "@limitkit/core";
import { UpdateLimitConfigBodySchema } from "../validation.js";

const updateLimitConfigJsonSchema = zodToJsonSchema(UpdateLimitConfigBodySchema, { target: "openApi3" });

export const limitConfigRoutes: FastifyPluginAsync = async (app) => {
  // GET /api/config
  app.get("/", {
    schema: {
      description: "Limit settings currently in effect.",
      tags: ["Config"],
    },
  }, async (_request, reply) => {
    return reply.code(200).send({ settings: app.limitConfig.getSettings() });
  });

  // PUT /api/config
  app.put("/", {
    schema: {
      description: "Apply remote-config limit keys. Missing or non-positive values keep the current setting.",
      tags: ["Config"],
      body: updateLimitConfigJsonSchema,
    },
  }, async (request, reply) => {
    const parsed = UpdateLimitConfigBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid request body", details: parsed.error.issues });
    }

    const settings = limitSettingsFromRemote(parsed.data, app.limitConfig.getSettings());
    app.limitConfig.replace(settings);
    app.log.info({ keys: Object.keys(parsed.data) }, "Limit settings updated");
    return reply.code(200).send({ settings: app.limitConfig.getSettings() });
  });
};
