import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { LOG_LEVELS } from "../logging/logger";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const TRUTHY = ["1", "true", "yes", "on"];
const FALSY = ["0", "false", "no", "off"];

const flag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") return defaultValue;
      const normalized = value.trim().toLowerCase();
      if (TRUTHY.includes(normalized)) return true;
      if (FALSY.includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean flag, got "${value}"` });
      return z.NEVER;
    });

export const GateEnv = z.object({
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3333),
  BOOT_GATE_CONFIG: z.string().min(1).default("./config/boot_gate.json"),
  BOOT_GATE_APP: z.string().min(1).optional(),
  BOOT_GATE_HALT_ON_MIGRATION: flag(true),
  BOOT_GATE_HALT_EXIT_CODE: z.coerce.number().int().min(0).max(255).default(0),
});

export type GateEnv = z.infer<typeof GateEnv>;

export function readGateEnv(source: NodeJS.ProcessEnv = process.env): GateEnv {
  const parsed = GateEnv.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export function requireBootApp(env: GateEnv): string {
  if (!env.BOOT_GATE_APP) {
    throw new Error("BOOT_GATE_APP must be set to the application whose migrations gate boot.");
  }
  return env.BOOT_GATE_APP;
}
