import { describe, it, expect } from '@jest/globals';
import { WeatherService } from '../src/services/weather-service';
import { ErrorCategory } from '../src/core/error-handler';
import { mockFetch } from './setup';
import { jsonResponse, requestedUrl, textResponse } from './helpers/mockHelper';

describe('WeatherService', () => {
  const service = new WeatherService({ baseUrl: 'https://weather.test', timeoutMs: 1000 });

  it('asks for current weather and a one day hourly forecast', async () => {
    const forecast = { current_weather: { temperature: 12.3, weathercode: 3 }, hourly: { time: [] } };
    mockFetch.mockResolvedValueOnce(jsonResponse(forecast));

    await expect(service.getForecast({ latitude: 52.37, longitude: 4.89 })).resolves.toEqual(forecast);

    const url = requestedUrl();
    expect(url.origin).toBe('https://weather.test');
    expect(url.pathname).toBe('/v1/forecast');
    expect(url.searchParams.get('latitude')).toBe('52.37');
    expect(url.searchParams.get('longitude')).toBe('4.89');
    expect(url.searchParams.get('current_weather')).toBe('true');
    expect(url.searchParams.get('hourly')).toBe('temperature_2m,precipitation,weather_code');
    expect(url.searchParams.get('forecast_days')).toBe('1');
    expect(url.searchParams.get('timezone')).toBe('auto');
  });

  it('rejects a body that is not an object', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([1, 2, 3]));

    await expect(service.getForecast({ latitude: 0, longitude: 0 })).rejects.toMatchObject({
      category: ErrorCategory.DATA,
      message: 'Open-Meteo returned an unexpected response',
    });
  });

  it('reports an upstream failure', async () => {
    mockFetch.mockResolvedValueOnce(textResponse('{"reason":"Latitude must be in range"}', 400));

    await expect(service.getForecast({ latitude: 0, longitude: 0 })).rejects.toMatchObject({
      category: ErrorCategory.API_ERROR,
      message: 'Open-Meteo API responded with 400',
    });
  });
});
