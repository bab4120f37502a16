import { z } from "zod";

export const LOG_LEVELS = ["ERR", "WRN", "INF", "DBG"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const EXTRA_ARGUMENT_MODES = ["reject", "ignore"] as const;
export type ExtraArgumentMode = (typeof EXTRA_ARGUMENT_MODES)[number];

const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("DBG"),
  ARMORY_EXTRA_ARGUMENTS: z.enum(EXTRA_ARGUMENT_MODES).default("reject"),
});

export interface ArmoryConfig {
  nodeEnv?: string;
  logLevel: LogLevel;
  /** What `use()` does with arguments a capability does not declare */
  extraArguments: ExtraArgumentMode;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ArmoryConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  return {
    nodeEnv: result.data.NODE_ENV,
    logLevel: result.data.LOG_LEVEL,
    extraArguments: result.data.ARMORY_EXTRA_ARGUMENTS,
  };
}
