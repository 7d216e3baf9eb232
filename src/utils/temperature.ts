import { ConversionError } from '@/utils/errors';

export const KELVIN_SHIFT = 273.15;
export const ABSOLUTE_ZERO_FAHRENHEIT = -459.67;

// NaN fails every comparison, so the bounds are written as "must be at least"
function assertAtLeast(conversion: string, value: number, min: number) {
  if (!(value >= min)) {
    throw new ConversionError(conversion, value);
  }
}

export function celsiusToKelvin(c: number): number {
  assertAtLeast('celsiusToKelvin', c, -KELVIN_SHIFT);
  return c + KELVIN_SHIFT;
}

export function kelvinToCelsius(k: number): number {
  assertAtLeast('kelvinToCelsius', k, 0);
  return k - KELVIN_SHIFT;
}

export function fahrenheitToCelsius(f: number): number {
  assertAtLeast('fahrenheitToCelsius', f, ABSOLUTE_ZERO_FAHRENHEIT);
  return ((f - 32) * 5) / 9;
}

export function celsiusToFahrenheit(c: number): number {
  assertAtLeast('celsiusToFahrenheit', c, -KELVIN_SHIFT);
  return (c * 9) / 5 + 32;
}

export function kelvinToFahrenheit(k: number): number {
  assertAtLeast('kelvinToFahrenheit', k, 0);
  return ((k - KELVIN_SHIFT) * 9) / 5 + 32;
}
