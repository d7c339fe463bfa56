import { z } from "zod";

const EnvSchema = z.object({
  STRUCTURAL_DEBUG: z.string().optional(),
  STRUCTURAL_DEFAULT_COMBO: z.string().min(1).optional()
});

export interface Config {
  /** Enables info/debug logging. */
  debug: boolean;
  /** Combination name used when the solver reports none. */
  defaultCombo: string;
}

export const DEFAULT_CONFIG: Config = { debug: false, defaultCombo: "Combo 1" };

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = EnvSchema.parse(env);
  return {
    debug: ["true", "1"].includes((parsed.STRUCTURAL_DEBUG ?? "").toLowerCase()),
    defaultCombo: parsed.STRUCTURAL_DEFAULT_COMBO ?? DEFAULT_CONFIG.defaultCombo
  };
}
