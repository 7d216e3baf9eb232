import { Request, Response } from 'express';
import { performance } from 'node:perf_hooks';
import { IWeatherQuery } from '@/types';
import { WeatherService } from '@/services/weather.service';
import { toWeatherResponse } from '@/utils/format';

export class WeatherController {
  constructor(private weatherService: WeatherService) {}

  async getWeather(req: Request, res: Response) {
    const begin = performance.now();
    const query: IWeatherQuery = res.locals.weatherQuery;

    const result = await this.weatherService.getCurrentTemperature(query);
    const body = toWeatherResponse(
      query.city,
      result,
      performance.now() - begin,
    );

    console.log(
      `city:${body.city}, latitude:${body.lat}, longitude:${body.long}, temperature:${body.temp}`,
    );
    res.json(body);
  }
}
