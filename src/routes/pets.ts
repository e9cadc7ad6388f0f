// src/routes/pets.ts

import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import {
  addPet,
  deletePet,
  getPet,
  listPets,
  searchChildByPet,
} from "../services/consistency-engine.js";
import { sendEngineFailure, sendValidationError, serviceContext } from "../utils/engine-reply.js";
import { idParamSchema, petCreateSchema } from "../validation/schemas.js";

const petsRoutes: FastifyPluginAsync = async (app: FastifyInstance) => {
  app.post("/pets", async (req, reply) => {
    const parsed = petCreateSchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const result = await addPet(serviceContext(app, req), parsed.data);
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.code(201).send(result);
  });

  app.get("/pets", async (req, reply) => {
    const result = await listPets(serviceContext(app, req));
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.send(result);
  });

  app.get("/pets/:id", async (req, reply) => {
    const params = idParamSchema.safeParse(req.params);
    if (!params.success) return sendValidationError(reply, params.error);

    const result = await getPet(serviceContext(app, req), params.data.id);
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.send(result);
  });

  // Deleting a pet keeps the owner's row and blanks its pet id
  app.delete("/pets/:id", async (req, reply) => {
    const params = idParamSchema.safeParse(req.params);
    if (!params.success) return sendValidationError(reply, params.error);

    const result = await deletePet(serviceContext(app, req), params.data.id);
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.send(result);
  });

  app.get("/pets/:id/child", async (req, reply) => {
    const params = idParamSchema.safeParse(req.params);
    if (!params.success) return sendValidationError(reply, params.error);

    const result = await searchChildByPet(serviceContext(app, req), params.data.id);
    if (!result.ok) return sendEngineFailure(reply, result.error);
    return reply.send(result);
  });
};

export default petsRoutes;
