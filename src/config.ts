/**
 * Environment-driven configuration.
 */

import { z } from "zod";
import { UserError } from "./errors.js";

const envSchema = z.object({
  REVLIFT_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  REVLIFT_GIT: z.string().min(1).default("git"),
  REVLIFT_MAX_BUFFER_MB: z.coerce.number().int().positive().default(64),
});

export interface Config {
  logLevel: z.infer<typeof envSchema>["REVLIFT_LOG_LEVEL"];
  gitPath: string;
  /** Max bytes a child process may write to stdout. */
  maxBuffer: number;
}

let cached: Config | undefined;

/**
 * Parse configuration from `env`.
 *
 * @throws UserError listing every invalid variable
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new UserError(`Invalid configuration: ${issues}`);
  }

  return {
    logLevel: result.data.REVLIFT_LOG_LEVEL,
    gitPath: result.data.REVLIFT_GIT,
    maxBuffer: result.data.REVLIFT_MAX_BUFFER_MB * 1024 * 1024,
  };
}

/** Configuration for this process, read from `process.env` once. */
export function loadConfig(): Config {
  cached ??= parseConfig(process.env);
  return cached;
}
