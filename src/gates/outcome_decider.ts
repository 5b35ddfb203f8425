export type GateDecision = "noop" | "migrated" | "halt";

export function decideGateOutcome(args: { appliedIds: readonly number[]; haltOnMigration: boolean }): GateDecision {
  if (args.appliedIds.length === 0) return "noop";
  return args.haltOnMigration ? "halt" : "migrated";
}
