import express from 'express';
import morgan from 'morgan';
import { AppConfig } from '@/config';
import { createWeatherRoutes } from '@/routes/weather.routes';
import { WeatherController } from '@/controllers/weather.controller';
import { WeatherService } from '@/services/weather.service';
import { IWeatherProvider } from '@/services/interfaces/weather.provider.interface';
import { OpenWeatherMapProvider } from '@/services/providers/openweathermap.provider';
import { DarkSkyProvider } from '@/services/providers/darksky.provider';
import { createHttpClient } from '@/utils/http-client';
import { errorHandler } from '@/middleware/error.middleware';

// Order matters: the first provider to report coordinates wins
export const createProviders = (config: AppConfig): IWeatherProvider[] => [
  new OpenWeatherMapProvider(
    createHttpClient({
      baseURL: config.openWeatherMapBaseUrl,
      timeout: config.providerTimeoutMs,
    }),
    config.openWeatherMapApiKey,
  ),
  new DarkSkyProvider(
    createHttpClient({
      baseURL: config.darkSkyBaseUrl,
      timeout: config.providerTimeoutMs,
    }),
    config.darkSkyApiKey,
  ),
];

export const createApp = (
  config: AppConfig,
  providers: readonly IWeatherProvider[] = createProviders(config),
) => {
  const app = express();

  // Middleware
  app.use(morgan('dev'));

  // DI
  const weatherService = new WeatherService(providers, {
    mode: config.aggregationMode,
    failurePolicy: config.failurePolicy,
    timeoutMs: config.providerTimeoutMs,
  });
  const weatherController = new WeatherController(weatherService);

  // Routes
  app.use(createWeatherRoutes(weatherController));

  // Health check
  app.get('/health-check', (req, res) => {
    res.send('up and running!');
  });

  // Error handling
  app.use(errorHandler);

  return app;
};
