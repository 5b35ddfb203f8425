import Fastify from "fastify";
import cors from "@fastify/cors";

import { healthRoutes, type GateStatus } from "./routes/healthz";

export function buildServer(opts: { gate: GateStatus; logger?: boolean }) {
  const app = Fastify({ logger: opts.logger ?? false });

  // Any origin may read /healthz; it carries no secrets.
  app.register(cors, {
    origin: true,
  });

  app.register(healthRoutes, { gate: opts.gate });

  return app;
}
