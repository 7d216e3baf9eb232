import { z } from 'zod';
import { IReading } from '@/types';
import { IWeatherProvider } from '@/services/interfaces/weather.provider.interface';
import { DecodeError, UnitError, WeatherError } from '@/utils/errors';
import { HttpClient, getJson } from '@/utils/http-client';
import { isUnknownLocation } from '@/utils/coordinates';
import {
  celsiusToFahrenheit,
  celsiusToKelvin,
  fahrenheitToCelsius,
} from '@/utils/temperature';

const ForecastSchema = z.object({
  currently: z.object({
    temperature: z.number().finite(),
  }),
  flags: z.object({
    units: z.string(),
  }),
});

const ZERO_READING: Readonly<IReading> = Object.freeze({
  celsius: 0,
  fahrenheit: 0,
  kelvin: 0,
  latitude: 0,
  longitude: 0,
});

/**
 * Coordinate-keyed provider speaking the Dark Sky forecast API, as served by
 * compatible hosts such as Pirate Weather. Without a location it returns the
 * zero reading, which the aggregator leaves out of the average.
 */
export class DarkSkyProvider implements IWeatherProvider {
  readonly name = 'darksky';

  constructor(
    private readonly http: HttpClient,
    private readonly apiKey: string,
  ) {}

  async fetchReading(
    city: string,
    latitude: number,
    longitude: number,
  ): Promise<Readonly<IReading>> {
    if (isUnknownLocation(latitude, longitude)) {
      console.log(`No latitude and longitude, skipping ${this.name} call for ${city}`);
      return ZERO_READING;
    }

    const location = `${latitude.toFixed(4)},${longitude.toFixed(4)}`;
    const body = await getJson(
      this.http,
      this.name,
      `/forecast/${encodeURIComponent(this.apiKey)}/${location}`,
      { exclude: 'minutely,hourly,daily,alerts' },
    );

    const parsed = ForecastSchema.safeParse(body);
    if (!parsed.success) {
      throw new DecodeError(
        this.name,
        `${this.name} returned an unexpected payload: ${parsed.error.message}`,
        { cause: parsed.error },
      );
    }
    const { currently, flags } = parsed.data;

    try {
      let celsius: number;
      let fahrenheit: number;
      if (flags.units === 'us') {
        fahrenheit = currently.temperature;
        celsius = fahrenheitToCelsius(fahrenheit);
      } else if (flags.units === 'si') {
        celsius = currently.temperature;
        fahrenheit = celsiusToFahrenheit(celsius);
      } else {
        throw new UnitError(this.name, flags.units);
      }
      const kelvin = celsiusToKelvin(celsius);

      return Object.freeze({ celsius, fahrenheit, kelvin, latitude, longitude });
    } catch (error) {
      if (error instanceof WeatherError) {
        console.error(`${this.name} conversion failed for ${city}: ${error.message}`);
      }
      throw error;
    }
  }
}
