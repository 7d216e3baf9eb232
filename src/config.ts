import { z } from 'zod';

const AppConfigSchema = z.object({
  port: z.coerce.number().int().positive().default(8080),
  openWeatherMapApiKey: z.string().min(1),
  openWeatherMapBaseUrl: z
    .string()
    .url()
    .default('https://api.openweathermap.org'),
  darkSkyApiKey: z.string().min(1),
  darkSkyBaseUrl: z.string().url().default('https://api.pirateweather.net'),
  providerTimeoutMs: z.coerce.number().int().positive().default(5000),
  aggregationMode: z.enum(['sequential', 'parallel']).default('sequential'),
  failurePolicy: z.enum(['fail-fast', 'tolerate']).default('fail-fast'),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return AppConfigSchema.parse({
    port: env.PORT,
    openWeatherMapApiKey: env.OPENWEATHERMAP_API_KEY,
    openWeatherMapBaseUrl: env.OPENWEATHERMAP_BASE_URL,
    darkSkyApiKey: env.DARKSKY_API_KEY,
    darkSkyBaseUrl: env.DARKSKY_BASE_URL,
    providerTimeoutMs: env.PROVIDER_TIMEOUT_MS,
    aggregationMode: env.AGGREGATION_MODE,
    failurePolicy: env.AGGREGATION_FAILURE_POLICY,
  });
}
