import { z } from "zod";

export type Config = {
  port: number;
  host: string;
  actionsDataPath: string;
};

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`Invalid ${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  ACTIONS_DATA_PATH: z.string().default("data/actions_data.json"),
});

/** Reads server settings from env. Blank values count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(String(issue?.path[0] ?? "environment"), issue?.message ?? "invalid value");
  }

  return {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    actionsDataPath: parsed.data.ACTIONS_DATA_PATH,
  };
}
