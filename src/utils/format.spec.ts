import { toWeatherResponse } from './format';

describe('toWeatherResponse', () => {
  it('rounds coordinates to four decimals and the temperature to two', () => {
    const response = toWeatherResponse(
      'Bucharest',
      {
        latitude: 44.42681,
        longitude: 26.10249,
        celsius: 19.456,
        contributors: ['openweathermap'],
        failures: [],
      },
      12.3456,
    );

    expect(response).toEqual({
      city: 'Bucharest',
      lat: '44.4268',
      long: '26.1025',
      temp: '19.46°C',
      took: '12.346ms',
    });
  });

  it('lists the providers that failed', () => {
    const response = toWeatherResponse(
      'Bucharest',
      {
        latitude: 0,
        longitude: 0,
        celsius: NaN,
        contributors: [],
        failures: [{ provider: 'darksky', error: new Error('timeout') }],
      },
      1,
    );

    expect(response.temp).toBe('NaN°C');
    expect(response.partial).toBe(true);
    expect(response.failedProviders).toEqual(['darksky']);
  });
});
