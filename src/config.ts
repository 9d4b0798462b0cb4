import {
  object,
  optional,
  picklist,
  pipe,
  safeParse,
  string,
  transform,
  type InferOutput,
} from "valibot";
import { makeLogger, type ILogger } from "./logging";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const flag = pipe(
  optional(string(), ""),
  transform((s) => s === "1" || s.toLowerCase() === "true"),
);

export const configSchema = object({
  LOG_LEVEL: optional(picklist(LEVELS), "info"),
  LOG_PRETTY: flag,
});

export type Config = {
  logLevel: (typeof LEVELS)[number];
  logPretty: boolean;
};

type RawConfig = InferOutput<typeof configSchema>;

const toConfig = (raw: RawConfig): Config => ({
  logLevel: raw.LOG_LEVEL,
  logPretty: raw.LOG_PRETTY,
});

/**
 * Reads logging settings from the environment.
 * Throws when LOG_LEVEL names a level pino does not know.
 */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Config => {
  const parsed = safeParse(configSchema, {
    LOG_LEVEL: env.LOG_LEVEL,
    LOG_PRETTY: env.LOG_PRETTY,
  });
  if (!parsed.success) {
    const issue = parsed.issues[0];
    throw new Error(`invalid config: ${issue.message}`);
  }
  return toConfig(parsed.output);
};

export const loggerFromEnv = (
  env: Record<string, string | undefined> = process.env,
): ILogger => {
  const { logLevel, logPretty } = loadConfig(env);
  return makeLogger(logLevel, logPretty);
};
