import { describe, it, expect } from "vitest";

import { DEFAULT_RUNTIME_SERVICES } from "../src/runtime/default_services";
import { ServiceRegistry, type RuntimeService } from "../src/runtime/service_registry";

describe("ServiceRegistry", () => {
  it("starts a service once, then reports it as already running", async () => {
    let starts = 0;
    const service: RuntimeService = {
      name: "crypto",
      start: async () => {
        starts += 1;
        return { algorithm: "sha256" };
      },
    };
    const registry = new ServiceRegistry();

    await expect(registry.ensureStarted(service)).resolves.toEqual({
      status: "started_fresh",
      detail: { algorithm: "sha256" },
    });
    await expect(registry.ensureStarted(service)).resolves.toEqual({
      status: "already_running",
      detail: { algorithm: "sha256" },
    });
    expect(starts).toBe(1);
    expect(registry.isStarted("crypto")).toBe(true);
  });

  it("turns a thrown start into a failed outcome and retries next time", async () => {
    let attempts = 0;
    const service: RuntimeService = {
      name: "tls",
      start: async () => {
        attempts += 1;
        if (attempts === 1) throw new Error("no ciphers");
        return undefined;
      },
    };
    const registry = new ServiceRegistry();

    await expect(registry.ensureStarted(service)).resolves.toEqual({ status: "failed", error: "no ciphers" });
    expect(registry.isStarted("tls")).toBe(false);
    await expect(registry.ensureStarted(service)).resolves.toEqual({ status: "started_fresh" });
  });

  it("starts the default services in order", async () => {
    const registry = new ServiceRegistry();
    const statuses: string[] = [];

    for (const service of DEFAULT_RUNTIME_SERVICES) {
      statuses.push((await registry.ensureStarted(service)).status);
    }

    expect(DEFAULT_RUNTIME_SERVICES.map((service) => service.name)).toEqual([
      "crypto",
      "tls",
      "sqlite_driver",
    ]);
    expect(statuses).toEqual(["started_fresh", "started_fresh", "started_fresh"]);
  });
});
