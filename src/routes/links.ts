// src/routes/links.ts
// Owners registry endpoints

import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import { linkChildAndPet, listLinks } from "../services/consistency-engine.js";
import { sendEngineFailure, sendValidationError, serviceContext } from "../utils/engine-reply.js";
import { linkCreateSchema } from "../validation/schemas.js";

const linksRoutes: FastifyPluginAsync = async (app: FastifyInstance) => {
  app.get("/links", async (req, reply) => {
    const result = await listLinks(serviceContext(app, req));
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.send(result);
  });

  /**
   * POST /links
   * Body: { childId, petId, override?, replaceChildLink?, reassignPet? }
   *
   * A conflict answers 409 with the current holder; the client repeats the
   * request with the matching override to go ahead.
   */
  app.post("/links", async (req, reply) => {
    const parsed = linkCreateSchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const { childId, petId, override, replaceChildLink, reassignPet } = parsed.data;
    const result = await linkChildAndPet(serviceContext(app, req), childId, petId, {
      replaceChildLink: replaceChildLink ?? override ?? false,
      reassignPet: reassignPet ?? override ?? false,
    });
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.send(result);
  });
};

export default linksRoutes;
