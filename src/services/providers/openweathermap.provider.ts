import { z } from 'zod';
import { IReading } from '@/types';
import { IWeatherProvider } from '@/services/interfaces/weather.provider.interface';
import { DecodeError } from '@/utils/errors';
import { HttpClient, getJson } from '@/utils/http-client';
import { kelvinToCelsius, kelvinToFahrenheit } from '@/utils/temperature';
import { hasCoordinates } from '@/utils/coordinates';

const CurrentWeatherSchema = z.object({
  main: z.object({
    temp: z.number().finite(), // Kelvin
  }),
  coord: z
    .object({
      lat: z.number().finite(),
      lon: z.number().finite(),
    })
    .optional(),
});

/**
 * City-keyed provider: queries OpenWeatherMap's current weather endpoint by
 * name only and reports the coordinates it resolved the city to, if any.
 */
export class OpenWeatherMapProvider implements IWeatherProvider {
  readonly name = 'openweathermap';

  constructor(
    private readonly http: HttpClient,
    private readonly apiKey: string,
  ) {}

  // the location is not part of this provider's query
  async fetchReading(
    city: string,
    _latitude?: number,
    _longitude?: number,
  ): Promise<Readonly<IReading>> {
    const body = await getJson(this.http, this.name, '/data/2.5/weather', {
      q: city,
      appid: this.apiKey,
    });

    const parsed = CurrentWeatherSchema.safeParse(body);
    if (!parsed.success) {
      throw new DecodeError(
        this.name,
        `${this.name} returned an unexpected payload: ${parsed.error.message}`,
        { cause: parsed.error },
      );
    }
    const { main, coord } = parsed.data;

    const kelvin = main.temp;
    const celsius = kelvinToCelsius(kelvin);
    const fahrenheit = kelvinToFahrenheit(kelvin);

    if (coord && hasCoordinates(coord.lat, coord.lon)) {
      console.log(
        `Latitude ${coord.lat.toFixed(4)} and longitude ${coord.lon.toFixed(4)} returned for ${city}`,
      );
      return Object.freeze({
        celsius,
        fahrenheit,
        kelvin,
        latitude: coord.lat,
        longitude: coord.lon,
      });
    }

    console.log(`No latitude and longitude returned for ${city}`);
    return Object.freeze({ celsius, fahrenheit, kelvin, latitude: 0, longitude: 0 });
  }
}
