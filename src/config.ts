import { z } from "zod";
import {
  DAMPING_PROFILE_NAMES,
  getDampingProfile,
  validateDampingFactors,
} from "./distance/DampingProfiles";
import { PATH_POLICIES } from "./types";

/**
 * Zod schema for configuration validation
 */
export const ConformityConfigSchema = z.object({
  defaultAlphas: z
    .array(z.number())
    .default([1])
    .superRefine((alphas, ctx) => {
      for (const message of validateDampingFactors(alphas)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      }
    }),
  dampingProfile: z.enum(DAMPING_PROFILE_NAMES).optional(),
  defaultProfileSize: z.number().int().positive().default(1),
  defaultPathPolicy: z.enum(PATH_POLICIES).default("shortest"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type ConformityConfig = z.output<typeof ConformityConfigSchema>;

/**
 * Load configuration from environment variables
 * @returns Complete ConformityConfig object
 * @throws Error if a variable holds an invalid value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ConformityConfig {
  const configData = {
    defaultAlphas: env.CONFORMITY_ALPHAS?.split(",").map((alpha) =>
      parseFloat(alpha.trim()),
    ),
    dampingProfile: env.CONFORMITY_DAMPING_PROFILE?.trim().toUpperCase(),
    defaultProfileSize: env.CONFORMITY_PROFILE_SIZE
      ? parseInt(env.CONFORMITY_PROFILE_SIZE, 10)
      : undefined,
    defaultPathPolicy: env.CONFORMITY_PATH_POLICY?.trim().toLowerCase(),
    logLevel: env.LOG_LEVEL?.trim().toLowerCase(),
  };

  const result = ConformityConfigSchema.safeParse(configData);

  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join(".")}: ${err.message}`)
      .join(", ");
    throw new Error(`Configuration validation failed: ${errorMessages}`);
  }

  return result.data;
}

/**
 * Damping factors to use by default: the named profile when one is set
 */
export function resolveAlphas(config: ConformityConfig): number[] {
  return config.dampingProfile
    ? getDampingProfile(config.dampingProfile)
    : [...config.defaultAlphas];
}
