import Fastify, { type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";

import type { DuplicatePolicy } from "./config/overview_config";
import { healthRoutes } from "./routes/healthz";
import { overviewRoutes } from "./routes/overview";

export type BuildAppOptions = {
  logger?: FastifyServerOptions["logger"];
  duplicatePolicy?: DuplicatePolicy;
};

export function buildApp(opts: BuildAppOptions = {}) {
  const app = Fastify({ logger: opts.logger ?? false });

  // CORS: permissive, the overview is read-only and carries no credentials.
  app.register(cors, {
    origin: true,
  });

  // Routes
  app.register(healthRoutes, { duplicatePolicy: opts.duplicatePolicy });
  app.register(overviewRoutes, { prefix: "/v1", duplicatePolicy: opts.duplicatePolicy });

  return app;
}
