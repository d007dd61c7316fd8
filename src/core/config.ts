import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

dotenvConfig();

const envSchema = z.object({
  DATABASE_PATH: z.string().default("./data/followers.db"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: z.string().default("true").transform((v) => v === "true"),
  X_BEARER_TOKEN: z.string().min(1).optional(),
  X_API_BASE_URL: z.string().url().default("https://api.twitter.com/1.1"),
  TARGET_SCREEN_NAME: z.string().min(1).optional(),
  PAGE_SIZE: z.coerce.number().int().min(1).max(200).default(200),
  COMMAND_CHANNEL_CAPACITY: z.coerce.number().int().min(1).default(32),
  SESSION_STALE_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(3600),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
