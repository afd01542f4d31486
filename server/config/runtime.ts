/**
 * Runtime Configuration
 *
 * Environment variables read once at server start and validated with zod.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { ConfigurationError } from "../utils/errorHandler";
import { LOG_LEVEL_NAMES } from "../utils/logger";

const runtimeConfigSchema = z
  .object({
    OPENAI_API_KEY: z.string().min(1).optional(),
    DATABASE_URL: z.string().min(1).optional(),
    CHECKPOINT_BACKEND: z.enum(["memory", "postgres"]).default("memory"),
    PORT: z.coerce.number().int().positive().default(5000),
    LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).default("info"),
    LOG_TO_FILE: z
      .enum(["true", "false"])
      .default("false")
      .transform(value => value === "true"),
  })
  .superRefine((config, ctx) => {
    if (config.CHECKPOINT_BACKEND === "postgres" && !config.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when CHECKPOINT_BACKEND is postgres",
      });
    }
  });

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = runtimeConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(fromZodError(parsed.error, { prefix: "Invalid environment" }).message);
  }
  return parsed.data;
}
