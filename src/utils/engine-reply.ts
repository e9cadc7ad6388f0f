// src/utils/engine-reply.ts
// Shared reply helpers for routes backed by the consistency engine

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { ZodError } from "zod";
import type { ServiceContext } from "../services/context.js";
import type { EngineFailure, EngineFailureCode } from "../services/consistency-engine.js";

const STATUS_BY_CODE: Record<EngineFailureCode, number> = {
  not_found: 404,
  conflict_existing_child_link: 409,
  conflict_pet_already_linked: 409,
  // the store could not complete the operation; earlier steps may be applied
  step_failed: 503,
};

export function serviceContext(app: FastifyInstance, req: FastifyRequest): ServiceContext {
  return { store: app.rowStore, log: req.log };
}

export function sendEngineFailure(reply: FastifyReply, failure: EngineFailure) {
  return reply.code(STATUS_BY_CODE[failure.code]).send({ ok: false, error: failure.code, detail: failure });
}

export function sendValidationError(reply: FastifyReply, error: ZodError) {
  return reply.code(400).send({
    ok: false,
    error: "validation_error",
    details: error.flatten().fieldErrors,
  });
}
