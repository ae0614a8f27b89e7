/**
 * Settings
 * Process-level defaults read from ANONYMIZER_* environment variables
 */

import { ConfigurationError } from "../errors.js";
import type { LogLevel } from "../utils/logger.js";
import { formatIssues, settingsSchema } from "./schemas.js";

export interface Settings {
  /** Entity types detected when a call does not name any; null for all */
  defaultEntities: string[] | null;
  scoreThreshold: number;
  maxDepth: number;
  logLevel: LogLevel;
}

/**
 * Parses settings from an environment
 * Unset and empty variables take their defaults
 */
export function loadSettings(
  env: Readonly<Record<string, string | undefined>> = process.env
): Settings {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([name, value]) =>
        name.startsWith("ANONYMIZER_") && value !== undefined && value.trim() !== ""
    )
  );

  const parsed = settingsSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid settings: ${formatIssues(parsed.error)}`);
  }

  const data = parsed.data;
  const entities = data.ANONYMIZER_DEFAULT_ENTITIES;
  return {
    defaultEntities: entities !== undefined && entities.length > 0 ? entities : null,
    scoreThreshold: data.ANONYMIZER_SCORE_THRESHOLD,
    maxDepth: data.ANONYMIZER_MAX_DEPTH,
    logLevel: data.ANONYMIZER_LOG_LEVEL,
  };
}
