import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import { isFeatureKey } from "@limitkit/schemas";
import { UnknownFeatureError } from "@limitkit/core";
import type { LimitManager } from "@limitkit/core";

interface FeatureParams {
  featureKey: string;
}

const featureParamsSchema = {
  type: "object",
  properties: { featureKey: { type: "string" } },
  required: ["featureKey"],
} as const;

function managerFor(app: FastifyInstance, featureKey: string): LimitManager {
  if (!isFeatureKey(featureKey) || !app.limits.has(featureKey)) {
    throw new UnknownFeatureError(featureKey);
  }
  return app.limits.get(featureKey);
}

async function describeFeature(manager: LimitManager) {
  const canPerformAction = await manager.canPerformAction();
  const state = await manager.getState();
  return {
    ...state,
    remainingCooldownSeconds: await manager.getRemainingCooldown(),
    canPerformAction,
  };
}

export const featuresRoutes: FastifyPluginAsync = async (app) => {
  // GET /api/features
  app.get("/", {
    schema: {
      description: "Quota state of every gated feature, plus the features currently in cooldown.",
      tags: ["Features"],
    },
  }, async (_request, reply) => {
    const features: Awaited<ReturnType<typeof describeFeature>>[] = [];
    for (const manager of app.limits.list()) {
      features.push(await describeFeature(manager));
    }
    const cooldowns = await app.limits.getCooldownSummary();
    return reply.code(200).send({ features, cooldowns });
  });

  // POST /api/features/reset
  app.post("/reset", {
    schema: {
      description: "Reset usage and cooldown for every feature.",
      tags: ["Features"],
    },
  }, async (_request, reply) => {
    await app.limits.resetAll();
    return reply.code(200).send({ reset: app.limits.keys() });
  });

  // GET /api/features/:featureKey
  app.get<{ Params: FeatureParams }>("/:featureKey", {
    schema: {
      description: "Quota state of one feature.",
      tags: ["Features"],
      params: featureParamsSchema,
    },
  }, async (request, reply) => {
    const manager = managerFor(app, request.params.featureKey);
    return reply.code(200).send({ feature: await describeFeature(manager) });
  });

  // POST /api/features/:featureKey/check
  app.post<{ Params: FeatureParams }>("/:featureKey/check", {
    schema: {
      description: "Decide whether the action may run now and whether to show the gating popup. Records nothing.",
      tags: ["Features"],
      params: featureParamsSchema,
    },
  }, async (request, reply) => {
    const manager = managerFor(app, request.params.featureKey);
    return reply.code(200).send({ result: await manager.checkLimit() });
  });

  // POST /api/features/:featureKey/perform
  app.post<{ Params: FeatureParams }>("/:featureKey/perform", {
    schema: {
      description: "Check the limit and record one usage when the action is allowed.",
      tags: ["Features"],
      params: featureParamsSchema,
    },
  }, async (request, reply) => {
    const manager = managerFor(app, request.params.featureKey);
    return reply.code(200).send({ result: await manager.performAction() });
  });

  // POST /api/features/:featureKey/usage
  app.post<{ Params: FeatureParams }>("/:featureKey/usage", {
    schema: {
      description: "Record one usage without checking the limit first.",
      tags: ["Features"],
      params: featureParamsSchema,
    },
  }, async (request, reply) => {
    const manager = managerFor(app, request.params.featureKey);
    return reply.code(200).send({ state: await manager.recordUsage() });
  });

  // POST /api/features/:featureKey/popup-open
  app.post<{ Params: FeatureParams }>("/:featureKey/popup-open", {
    schema: {
      description: "The gating popup was shown. Starts the cooldown if the quota is used up and no window runs yet.",
      tags: ["Features"],
      params: featureParamsSchema,
    },
  }, async (request, reply) => {
    const manager = managerFor(app, request.params.featureKey);
    const remainingCooldownSeconds = await manager.startCooldownOnPopupOpen();
    return reply.code(200).send({ remainingCooldownSeconds });
  });

  // POST /api/features/:featureKey/reset
  app.post<{ Params: FeatureParams }>("/:featureKey/reset", {
    schema: {
      description: "Reset usage and cooldown for one feature.",
      tags: ["Features"],
      params: featureParamsSchema,
    },
  }, async (request, reply) => {
    const manager = managerFor(app, request.params.featureKey);
    await manager.resetUsage();
    return reply.code(200).send({ state: await manager.getState() });
  });
};
