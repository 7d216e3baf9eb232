export interface ILocation {
  latitude: number;
  longitude: number;
}

// (0, 0) coordinates and 0 Kelvin mean "unknown"
export interface IReading extends ILocation {
  celsius: number;
  fahrenheit: number;
  kelvin: number;
}

export interface IWeatherQuery extends ILocation {
  city: string;
}

export type AggregationMode = 'sequential' | 'parallel';

export type FailurePolicy = 'fail-fast' | 'tolerate';

export interface IAggregationOptions {
  mode?: AggregationMode;
  failurePolicy?: FailurePolicy;
  timeoutMs?: number;
}

export interface IProviderFailure {
  provider: string;
  error: Error;
}

export interface IAggregateResult extends ILocation {
  celsius: number; // NaN when no provider contributed
  contributors: string[];
  failures: IProviderFailure[];
}

export interface IWeatherResponse {
  city: string;
  lat: string;
  long: string;
  temp: string;
  took: string;
  partial?: boolean;
  failedProviders?: string[];
}
