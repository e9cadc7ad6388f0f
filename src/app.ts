// src/app.ts
import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import type { RowStore } from "./lib/row-store/index.js";
import childrenRoutes from "./routes/children.js";
import linksRoutes from "./routes/links.js";
import petsRoutes from "./routes/pets.js";

export interface BuildAppOptions {
  store: RowStore;
  /** Omit to run without logging (tests) */
  logger?: FastifyBaseLogger;
  allowedOrigins?: string[];
}

// ---------- TS typing: row store on the instance ----------
declare module "fastify" {
  interface FastifyInstance {
    rowStore: RowStore;
  }
}

export async function buildApp(opts: BuildAppOptions): Promise<FastifyInstance> {
  const allowedOrigins = opts.allowedOrigins ?? [];

  const app = Fastify({
    loggerInstance: opts.logger,
    trustProxy: true,
  });

  // ---------- Decorators ----------
  app.decorate("rowStore", opts.store);

  // ---------- Security ----------
  await app.register(helmet, { contentSecurityPolicy: false });

  // ---------- CORS ----------
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true); // server-to-server/curl
      if (/^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/i.test(origin)) return cb(null, true);
      if (allowedOrigins.includes(origin)) return cb(null, true);
      app.log.warn({ origin }, "CORS: origin not allowed");
      return cb(new Error("CORS: origin not allowed"), false);
    },
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["content-type", "x-requested-with"],
  });

  // ---------- Request logging ----------
  app.addHook("onRequest", async (req) => {
    req.log.info({ m: req.method, url: req.url }, "REQ");
  });

  // ---------- Health ----------
  app.get("/healthz", async () => ({ ok: true }));

  // ---------- API v1 ----------
  await app.register(
    async (api) => {
      api.register(childrenRoutes); // /api/v1/children/*
      api.register(petsRoutes);     // /api/v1/pets/*
      api.register(linksRoutes);    // /api/v1/links
    },
    { prefix: "/api/v1" }
  );

  // ---------- Global error handler ----------
  app.setErrorHandler<FastifyError>((err, req, reply) => {
    req.log.error(
      {
        err: { message: err.message, code: err.code, stack: err.stack },
        url: req.url,
        method: req.method,
      },
      "Unhandled error"
    );

    // framework errors (bad JSON, payload too large) carry their own status
    if (err.statusCode && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ ok: false, error: err.message });
    }
    return reply.status(500).send({ ok: false, error: "internal_error" });
  });

  // ---------- Not Found ----------
  app.setNotFoundHandler((req, reply) => {
    req.log.warn({ m: req.method, url: req.url }, "NOT FOUND");
    reply.code(404).send({ ok: false, error: "not_found" });
  });

  return app;
}
