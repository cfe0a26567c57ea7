import { z } from "zod";

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  OPENWEATHER_API_KEY: z.string().min(1),
  OPENWEATHER_BASE_URL: z.string().url().default("https://api.openweathermap.org"),
  WEATHER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LANGUAGES_DIR: z.string().default("languages"),
  IMAGES_DIR: z.string().default("images"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse({
    ...env,
    TELEGRAM_BOT_TOKEN: env.TELEGRAM_BOT_TOKEN || env.BOT_TOKEN
  });
}
