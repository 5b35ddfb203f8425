import type { GateLogger } from "../logging/logger";
import type { RuntimeService, ServiceRegistry } from "../runtime/service_registry";
import { BootGateError } from "./boot_gate_error";

/**
 * Starts each service in order. Failures are logged and never stop the
 * gate; the repository or migration step surfaces what actually broke.
 */
export async function bootstrapServices(
  services: readonly RuntimeService[],
  registry: ServiceRegistry,
  log: GateLogger
): Promise<void> {
  log.info({ evt: "boot_gate.services_starting", count: services.length }, "boot_gate.services_starting");

  for (const service of services) {
    const outcome = await registry.ensureStarted(service);
    switch (outcome.status) {
      case "started_fresh":
        log.info(
          { evt: "boot_gate.service_started", service: service.name, ...outcome.detail },
          "boot_gate.service_started"
        );
        break;
      case "already_running":
        log.info(
          { evt: "boot_gate.service_already_running", service: service.name },
          "boot_gate.service_already_running"
        );
        break;
      case "failed": {
        const failure = new BootGateError({
          code: "dependency_start_failure",
          message: `service ${service.name} failed to start: ${outcome.error}`,
          service: service.name,
          cause: outcome.error,
        });
        log.warn(
          { evt: "boot_gate.dependency_start_failure", ...failure.toJSON() },
          "boot_gate.dependency_start_failure"
        );
        break;
      }
    }
  }

  log.info({ evt: "boot_gate.services_started" }, "boot_gate.services_started");
}
