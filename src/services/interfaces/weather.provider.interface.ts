import { IReading } from '@/types';

export interface IWeatherProvider {
  readonly name: string;
  fetchReading(
    city: string,
    latitude: number,
    longitude: number,
  ): Promise<Readonly<IReading>>;
}
