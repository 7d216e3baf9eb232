import {
  IAggregateResult,
  IAggregationOptions,
  IProviderFailure,
  IReading,
  IWeatherQuery,
} from '@/types';
import { IWeatherProvider } from '@/services/interfaces/weather.provider.interface';
import { AggregationError, NetworkError } from '@/utils/errors';
import { hasCoordinates, isUnknownLocation } from '@/utils/coordinates';
import { withTimeout } from '@/utils/timeout';

export const DEFAULT_PROVIDER_TIMEOUT_MS = 5000;

type Outcome =
  | { provider: string; ok: true; reading: Readonly<IReading> }
  | { provider: string; ok: false; error: Error };

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

function callProvider(
  provider: IWeatherProvider,
  query: IWeatherQuery,
  timeoutMs: number,
): Promise<Outcome> {
  return withTimeout(
    provider.fetchReading(query.city, query.latitude, query.longitude),
    timeoutMs,
    () =>
      new NetworkError(
        provider.name,
        `${provider.name} request timed out after ${timeoutMs}ms`,
      ),
  ).then(
    (reading): Outcome => ({ provider: provider.name, ok: true, reading }),
    (error: unknown): Outcome => ({
      provider: provider.name,
      ok: false,
      error: toError(error),
    }),
  );
}

async function collect(
  providers: readonly IWeatherProvider[],
  query: IWeatherQuery,
  options: Required<IAggregationOptions>,
): Promise<Outcome[]> {
  // in parallel mode every call starts now; outcomes are still read in
  // provider order, so a fail-fast stop does not wait on later providers
  const pending =
    options.mode === 'parallel'
      ? providers.map((p) => callProvider(p, query, options.timeoutMs))
      : undefined;

  const outcomes: Outcome[] = [];
  for (const [i, provider] of providers.entries()) {
    const outcome = await (pending
      ? pending[i]
      : callProvider(provider, query, options.timeoutMs));
    outcomes.push(outcome);
    if (!outcome.ok && options.failurePolicy === 'fail-fast') break;
  }
  return outcomes;
}

/**
 * Ask every provider for the current temperature of `query.city` and combine
 * the readings, in provider order:
 *
 * - a reading counts towards the mean only when its Kelvin value is above 0;
 * - when the query's location is unknown, the first reading with non-zero
 *   coordinates supplies them and later ones are ignored;
 * - the mean is `NaN` when no reading counted.
 *
 * Each provider sees the query's own coordinates, never ones resolved from
 * another provider. Under the default `fail-fast` policy the first failure in
 * provider order rejects with an AggregationError; with `tolerate` failures
 * are reported on the result and only a total failure rejects.
 */
export async function aggregate(
  providers: readonly IWeatherProvider[],
  query: IWeatherQuery,
  options: IAggregationOptions = {},
): Promise<IAggregateResult> {
  const resolvedOptions: Required<IAggregationOptions> = {
    mode: options.mode ?? 'sequential',
    failurePolicy: options.failurePolicy ?? 'fail-fast',
    timeoutMs: options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
  };

  const outcomes = await collect(providers, query, resolvedOptions);

  const failures: IProviderFailure[] = [];
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      failures.push({ provider: outcome.provider, error: outcome.error });
    }
  }

  if (failures.length > 0) {
    if (resolvedOptions.failurePolicy === 'fail-fast') {
      throw new AggregationError([failures[0]]);
    }
    for (const { provider, error } of failures) {
      console.error(`Provider ${provider} failed for ${query.city}: ${error.message}`);
    }
    if (failures.length === outcomes.length) {
      throw new AggregationError(failures);
    }
  }

  let sum = 0;
  let count = 0;
  let { latitude, longitude } = query;
  const contributors: string[] = [];

  for (const outcome of outcomes) {
    if (!outcome.ok) continue;
    const { reading } = outcome;

    // 0 Kelvin is a bad measurement or the "unknown" reading
    if (reading.kelvin > 0) {
      sum += reading.celsius;
      count += 1;
      contributors.push(outcome.provider);
    }

    if (
      isUnknownLocation(latitude, longitude) &&
      hasCoordinates(reading.latitude, reading.longitude)
    ) {
      latitude = reading.latitude;
      longitude = reading.longitude;
    }
  }

  return {
    latitude,
    longitude,
    celsius: sum / count,
    contributors,
    failures,
  };
}
