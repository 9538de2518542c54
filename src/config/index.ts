import { z } from "zod";

export const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Bound on every wait for a host address, in milliseconds. */
  operationTimeoutMs: z.coerce.number().int().positive().default(300_000),
});

export const config = configSchema.parse({
  nodeEnv: process.env.NODE_ENV,
  logLevel: process.env.LOG_LEVEL,
  operationTimeoutMs: process.env.HOST_OPERATION_TIMEOUT_MS,
});

export type Config = z.infer<typeof configSchema>;
