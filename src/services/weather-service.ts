/**
 * Weather Service
 * Current conditions and a 24 hour forecast from Open-Meteo
 */

import { HttpClient, isRecord } from '../core/http-client.js';
import { ErrorCategory, ToolError } from '../core/error-handler.js';
import type { WeatherConfig } from '../core/config.js';
import type { OpenMeteoForecast, WeatherQuery } from '../types/integrations.types.js';

export const HOURLY_VARIABLES = ['temperature_2m', 'precipitation', 'weather_code'];

export class WeatherService {
  private readonly http: HttpClient;

  constructor(config: WeatherConfig) {
    this.http = new HttpClient({
      serviceName: 'Open-Meteo',
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
    });
  }

  async getForecast(query: WeatherQuery): Promise<OpenMeteoForecast> {
    const path = '/v1/forecast';
    const json = await this.http.getJson(path, {
      latitude: query.latitude,
      longitude: query.longitude,
      current_weather: true,
      hourly: HOURLY_VARIABLES,
      forecast_days: 1,
      timezone: 'auto',
    });

    if (!isRecord(json)) {
      throw new ToolError(ErrorCategory.DATA, 'Open-Meteo returned an unexpected response', { path });
    }
    return json;
  }
}
