/**
 * Children API Routes
 *
 * POST   /children            add a child
 * GET    /children            list children
 * GET    /children/:id        one child
 * DELETE /children/:id        delete a child and its Owners row
 * GET    /children/:id/pet    the pet linked to a child
 */

import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import {
  addChild,
  deleteChild,
  getChild,
  listChildren,
  searchPetByChild,
} from "../services/consistency-engine.js";
import { sendEngineFailure, sendValidationError, serviceContext } from "../utils/engine-reply.js";
import { childCreateSchema, idParamSchema } from "../validation/schemas.js";

const childrenRoutes: FastifyPluginAsync = async (app: FastifyInstance) => {
  app.post("/children", async (req, reply) => {
    const parsed = childCreateSchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const result = await addChild(serviceContext(app, req), parsed.data);
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.code(201).send(result);
  });

  app.get("/children", async (req, reply) => {
    const result = await listChildren(serviceContext(app, req));
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.send(result);
  });

  app.get("/children/:id", async (req, reply) => {
    const params = idParamSchema.safeParse(req.params);
    if (!params.success) return sendValidationError(reply, params.error);

    const result = await getChild(serviceContext(app, req), params.data.id);
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.send(result);
  });

  app.delete("/children/:id", async (req, reply) => {
    const params = idParamSchema.safeParse(req.params);
    if (!params.success) return sendValidationError(reply, params.error);

    const result = await deleteChild(serviceContext(app, req), params.data.id);
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.send(result);
  });

  /**
   * 200 with status "unlinked" | "inconsistent" | "found";
   * 404 only when the child itself does not exist.
   */
  app.get("/children/:id/pet", async (req, reply) => {
    const params = idParamSchema.safeParse(req.params);
    if (!params.success) return sendValidationError(reply, params.error);

    const result = await searchPetByChild(serviceContext(app, req), params.data.id);
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.send(result);
  });
};

export default childrenRoutes;
