/**
 * Input Schemas
 * zod schemas for caller-supplied operator specs, detection configs and settings
 */

import { z } from "zod";
import { LOG_LEVELS } from "../utils/logger.js";
import { DEFAULT_SCORE_THRESHOLD, OPERATOR_KINDS } from "../types/index.js";

/** Sets are accepted wherever a list is */
const stringList = z.preprocess(
  (value) => (value instanceof Set ? Array.from(value) : value),
  z.array(z.string())
);

// ============================================================================
// Operators
// ============================================================================

export const operatorKindSchema = z.enum(OPERATOR_KINDS);

const maskCharSchema = z
  .string()
  .refine((value) => Array.from(value).length === 1, {
    message: "maskChar must be a single character",
  });

export const operatorSpecSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("redact") }),
  z.object({ kind: z.literal("replace") }),
  z.object({
    kind: z.literal("mask"),
    maskChar: maskCharSchema.default("*"),
    numberOfChars: z
      .number()
      .int("numberOfChars must be an integer")
      .nonnegative("numberOfChars must not be negative")
      .default(15),
  }),
  z.object({ kind: z.literal("hash") }),
  z.object({
    kind: z.literal("encrypt"),
    key: z.union([z.string(), z.instanceof(Uint8Array)]),
  }),
  z.object({ kind: z.literal("highlight") }),
]);

export type ParsedOperatorSpec = z.infer<typeof operatorSpecSchema>;

// ============================================================================
// Detection config
// ============================================================================

export const recognizerConfigSchema = z.object({
  entities: stringList.nullable().optional(),
  scoreThreshold: z.number().min(0).max(1).optional(),
  allowList: stringList.optional(),
  denyList: stringList.optional(),
  returnExplanation: z.boolean().optional(),
});

// ============================================================================
// Settings
// ============================================================================

/** Comma-separated list, blank entries dropped */
const commaList = z
  .string()
  .trim()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim().toUpperCase())
      .filter((item) => item.length > 0)
  );

export const settingsSchema = z.object({
  ANONYMIZER_DEFAULT_ENTITIES: commaList.optional(),
  ANONYMIZER_SCORE_THRESHOLD: z.coerce
    .number()
    .min(0)
    .max(1)
    .default(DEFAULT_SCORE_THRESHOLD),
  ANONYMIZER_MAX_DEPTH: z.coerce.number().int().positive().default(100),
  ANONYMIZER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .default("info"),
});

export type RawSettings = z.infer<typeof settingsSchema>;

/**
 * Joins zod issues into one line ("path: message; ...")
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");
}
