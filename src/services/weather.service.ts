import { IAggregateResult, IAggregationOptions, IWeatherQuery } from '@/types';
import { IWeatherProvider } from '@/services/interfaces/weather.provider.interface';
import { aggregate } from '@/services/aggregator';

export class WeatherService {
  constructor(
    private readonly providers: readonly IWeatherProvider[],
    private readonly options: IAggregationOptions = {},
  ) {}

  async getCurrentTemperature(query: IWeatherQuery): Promise<IAggregateResult> {
    return aggregate(this.providers, query, this.options);
  }
}
