import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default("0.0.0.0"),
  REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
  JWT_ACCESS_SECRET: z.string().min(16).default("local-development-access-secret"),
  CORS_ORIGINS: z
    .string()
    .default("http://localhost:3000,http://localhost:5173,http://127.0.0.1:5173")
    .transform((value) => value.split(",").map((item) => item.trim()).filter(Boolean)),
  SETTINGS_FILE: z.string().min(1).default("settings.json"),
  SESSION_IDLE_TIMEOUT_MINUTES: z.coerce.number().int().positive().default(30),
  SESSION_SWEEP_INTERVAL_MINUTES: z.coerce.number().int().positive().default(5),
  CONVERSATION_INCLUDE_DERIVED_SALARY: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
  TELLER_NAME: z.string().min(1).default("Kirztin"),
  MANAGER_ROLE_ID: z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined)
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
