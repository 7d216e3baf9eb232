import { IAggregateResult, IWeatherResponse } from '@/types';

export const formatCoordinate = (value: number) => value.toFixed(4);

// NaN stays visible as "NaN°C"
export const formatCelsius = (value: number) => `${value.toFixed(2)}°C`;

export const formatDuration = (ms: number) => `${ms.toFixed(3)}ms`;

export function toWeatherResponse(
  city: string,
  result: IAggregateResult,
  elapsedMs: number,
): IWeatherResponse {
  const response: IWeatherResponse = {
    city,
    lat: formatCoordinate(result.latitude),
    long: formatCoordinate(result.longitude),
    temp: formatCelsius(result.celsius),
    took: formatDuration(elapsedMs),
  };

  if (result.failures.length > 0) {
    response.partial = true;
    response.failedProviders = result.failures.map((f) => f.provider);
  }

  return response;
}
