import type { FastifyInstance } from "fastify";

import type { DuplicatePolicy } from "../config/overview_config";

type HealthRoutesOptions = {
  duplicatePolicy?: DuplicatePolicy;
};

export async function healthRoutes(app: FastifyInstance, opts: HealthRoutesOptions = {}) {
  app.get("/healthz", async () => ({
    ok: true,
    service: "solver-log-overview",
    duplicatePolicy: opts.duplicatePolicy ?? "first",
    ts: new Date().toISOString(),
  }));
}
