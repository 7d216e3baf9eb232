import { IProviderFailure } from '@/types';

export class WeatherError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkError extends WeatherError {
  constructor(
    public readonly provider: string,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class DecodeError extends WeatherError {
  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class UnitError extends WeatherError {
  constructor(
    public readonly provider: string,
    public readonly unit: string,
  ) {
    super(`${provider}: unexpected unit type "${unit}"`);
  }
}

export class ConversionError extends WeatherError {
  constructor(
    public readonly conversion: string,
    public readonly value: number,
  ) {
    super(`${conversion}: ${value} is out of range`);
  }
}

/**
 * Raised by the aggregator. `cause` is the first provider failure in
 * provider order; `failures` lists every failure that was observed.
 */
export class AggregationError extends WeatherError {
  readonly provider: string;

  constructor(public readonly failures: IProviderFailure[]) {
    const [first] = failures;
    const provider = first ? first.provider : 'unknown';
    super(
      first
        ? `aggregation failed at provider ${provider}: ${first.error.message}`
        : 'aggregation failed',
      { cause: first?.error },
    );
    this.provider = provider;
  }
}

export class ValidationError extends WeatherError {}
