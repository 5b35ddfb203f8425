import type { FastifyInstance } from "fastify";

export type GateStatus = {
  app: string;
  outcome: "noop" | "migrated";
  appliedIds: number[];
  checkedAt: string;
};

export async function healthRoutes(app: FastifyInstance, opts: { gate: GateStatus }) {
  app.get("/healthz", async () => ({
    ok: true,
    service: "boot-gate",
    gate: opts.gate,
    ts: new Date().toISOString(),
  }));
}
