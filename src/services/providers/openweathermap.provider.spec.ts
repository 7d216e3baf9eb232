import { AxiosError } from 'axios';
import { OpenWeatherMapProvider } from './openweathermap.provider';
import {
  ConversionError,
  DecodeError,
  NetworkError,
} from '@/utils/errors';

describe('OpenWeatherMapProvider', () => {
  let get: jest.Mock;
  let provider: OpenWeatherMapProvider;
  let log: jest.SpyInstance;

  beforeEach(() => {
    get = jest.fn();
    provider = new OpenWeatherMapProvider({ get }, 'test-key');
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const respondWith = (body: unknown) =>
    get.mockResolvedValueOnce({ data: JSON.stringify(body) });

  it('queries by city name only', async () => {
    respondWith({ main: { temp: 293.15 } });

    await provider.fetchReading('Bucharest', 41.6267, -93.7122);

    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith('/data/2.5/weather', {
      params: { q: 'Bucharest', appid: 'test-key' },
    });
  });

  it('converts the Kelvin temperature to the other scales', async () => {
    respondWith({
      main: { temp: 293.15 },
      coord: { lat: 44.4268, lon: 26.1025 },
    });

    const reading = await provider.fetchReading('Bucharest', 0, 0);

    expect(reading.kelvin).toBe(293.15);
    expect(reading.celsius).toBeCloseTo(20, 9);
    expect(reading.fahrenheit).toBeCloseTo(68, 9);
    expect(reading.latitude).toBe(44.4268);
    expect(reading.longitude).toBe(26.1025);
    expect(log).toHaveBeenCalledWith(
      'Latitude 44.4268 and longitude 26.1025 returned for Bucharest',
    );
  });

  it('reports unknown coordinates when the response has none', async () => {
    respondWith({ main: { temp: 280 } });

    const reading = await provider.fetchReading('Atlantis', 0, 0);

    expect(reading.latitude).toBe(0);
    expect(reading.longitude).toBe(0);
    expect(log).toHaveBeenCalledWith(
      'No latitude and longitude returned for Atlantis',
    );
  });

  it('rejects a body that is not JSON', async () => {
    get.mockResolvedValueOnce({ data: '<html>bad gateway</html>' });

    await expect(provider.fetchReading('Bucharest', 0, 0)).rejects.toThrow(
      new DecodeError('openweathermap', 'openweathermap returned malformed JSON'),
    );
  });

  it('rejects a body without a temperature', async () => {
    respondWith({ main: {} });

    await expect(
      provider.fetchReading('Bucharest', 0, 0),
    ).rejects.toBeInstanceOf(DecodeError);
  });

  it('rejects a temperature that overflows to Infinity', async () => {
    get.mockResolvedValueOnce({ data: '{"main":{"temp":1e999}}' });

    await expect(
      provider.fetchReading('Bucharest', 0, 0),
    ).rejects.toBeInstanceOf(DecodeError);
  });

  it('returns a frozen reading', async () => {
    respondWith({ main: { temp: 280 } });

    const reading = await provider.fetchReading('Bucharest', 0, 0);

    expect(Object.isFrozen(reading)).toBe(true);
  });

  it('rejects a temperature below absolute zero', async () => {
    respondWith({ main: { temp: -3 } });

    await expect(
      provider.fetchReading('Bucharest', 0, 0),
    ).rejects.toBeInstanceOf(ConversionError);
  });

  it('maps transport failures to NetworkError', async () => {
    get.mockRejectedValueOnce(
      new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED'),
    );

    await expect(provider.fetchReading('Bucharest', 0, 0)).rejects.toMatchObject({
      name: 'NetworkError',
      provider: 'openweathermap',
      message: 'openweathermap request failed: ECONNABORTED',
    });
  });

  it('maps error statuses to NetworkError with the status', async () => {
    get.mockRejectedValueOnce(
      Object.assign(
        new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST'),
        { response: { status: 404 } },
      ),
    );

    const error: unknown = await provider
      .fetchReading('Nowhere', 0, 0)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({
      status: 404,
      message: 'openweathermap request failed: HTTP 404',
    });
  });
});
