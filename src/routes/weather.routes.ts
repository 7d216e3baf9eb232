import { Router } from 'express';
import { WeatherController } from '@/controllers/weather.controller';
import { validateWeatherRequest } from '@/middleware/validation.middleware';
import { asyncHandler } from '@/middleware/error.middleware';

export const createWeatherRoutes = (weatherController: WeatherController) => {
  const weatherRoutes = Router();
  weatherRoutes.get(
    '/weather/:city',
    validateWeatherRequest,
    asyncHandler(weatherController.getWeather.bind(weatherController)),
  );
  return weatherRoutes;
};
