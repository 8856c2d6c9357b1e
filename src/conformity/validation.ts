import { z } from "zod";
import { validateDampingFactors } from "../distance/DampingProfiles";
import { InvalidArgumentError, PATH_POLICIES } from "../types";
import { generateProfiles, profileKey } from "./profiles";

const hierarchySchema = z
  .record(z.string(), z.number().finite())
  .refine((ranks) => Object.keys(ranks).length >= 2, {
    message: "a hierarchy needs at least two values",
  });

export const ConformityRequestSchema = z
  .object({
    alphas: z
      .array(z.number())
      .min(1, "At least one alpha is required")
      .superRefine((alphas, ctx) => {
        for (const message of validateDampingFactors(alphas)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message });
        }
      }),
    labels: z
      .array(z.string().min(1))
      .min(1, "At least one label is required")
      .refine((labels) => new Set(labels).size === labels.length, {
        message: "labels must be distinct",
      }),
    profileSize: z.number().int().positive().default(1),
    hierarchies: z.record(z.string(), hierarchySchema).default({}),
    pathPolicy: z.enum(PATH_POLICIES).default("shortest"),
  })
  .refine((request) => request.profileSize <= request.labels.length, {
    message: "profileSize must be <= number of labels",
    path: ["profileSize"],
  })
  .superRefine((request, ctx) => {
    // profile keys join labels with "_", so a label may spell another profile
    const seen = new Set<string>();
    for (const profile of generateProfiles(request.labels, request.profileSize)) {
      const key = profileKey(profile);
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `profile key "${key}" is produced by more than one profile`,
          path: ["labels"],
        });
        return;
      }
      seen.add(key);
    }
  });

export const WindowRequestSchema = z
  .object({
    start: z.number().int(),
    delta: z.number().int().nonnegative(),
  })
  .and(ConformityRequestSchema);

export const SlidingRequestSchema = z
  .object({
    delta: z.number().int().nonnegative(),
  })
  .and(ConformityRequestSchema);

export type ValidatedConformityRequest = z.output<typeof ConformityRequestSchema>;
export type ValidatedWindowRequest = z.output<typeof WindowRequestSchema>;
export type ValidatedSlidingRequest = z.output<typeof SlidingRequestSchema>;

/**
 * Parse a request with a zod schema, raising InvalidArgumentError on failure
 */
export function parseRequest<T extends z.ZodTypeAny>(
  schema: T,
  request: unknown,
): z.output<T> {
  const result = schema.safeParse(request);

  if (!result.success) {
    const issues = result.error.errors;
    const errorMessages = issues
      .map((err) =>
        err.path.length > 0 ? `${err.path.join(".")}: ${err.message}` : err.message,
      )
      .join(", ");
    throw new InvalidArgumentError(
      `Invalid conformity request: ${errorMessages}`,
      issues[0]?.path.join("."),
    );
  }

  return result.data;
}
