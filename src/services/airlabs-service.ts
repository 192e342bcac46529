/**
 * AirLabs Service
 * Flight status, schedules, airport lookup and departure delays
 */

import { HttpClient, isRecord } from '../core/http-client.js';
import { ErrorCategory, ToolError } from '../core/error-handler.js';
import type { AirLabsConfig } from '../core/config.js';
import type { AirLabsAirport, AirLabsFlight, ScheduleQuery } from '../types/integrations.types.js';

export const DEFAULT_DELAY_THRESHOLD_MINUTES = 30;

export class AirLabsService {
  private readonly http: HttpClient;

  constructor(config: AirLabsConfig) {
    this.http = new HttpClient({
      serviceName: 'AirLabs',
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      defaultQuery: { api_key: config.apiKey },
    });
  }

  /**
   * Live status of one flight; null when AirLabs has nothing for it
   */
  async getFlightStatus(flightIata: string): Promise<AirLabsFlight | null> {
    const path = '/flight';
    const response = await this.http.send(path, { query: { flight_iata: flightIata } });

    if (response.status === 403) {
      throw new ToolError(ErrorCategory.AUTHENTICATION, 'AirLabs API key is invalid or expired', { path, status: 403 });
    }
    if (response.status === 404) {
      throw new ToolError(
        ErrorCategory.DATA,
        `Flight ${flightIata} is not currently active or tracked live. Try checking the schedule.`,
        { path, status: 404 }
      );
    }
    await this.http.assertOk(response, path);

    const flight = this.unwrap(await this.http.readJson(response, path), path);
    if (Array.isArray(flight)) {
      const first: unknown = flight[0];
      return isRecord(first) ? first : null;
    }
    return isRecord(flight) && Object.keys(flight).length > 0 ? flight : null;
  }

  async getSchedules(query: ScheduleQuery): Promise<AirLabsFlight[]> {
    const path = '/schedules';
    const json = await this.http.getJson(path, {
      dep_iata: query.depIata,
      arr_iata: query.arrIata,
      date: query.date,
    });
    return this.recordList(this.unwrap(json, path));
  }

  async searchAirports(query: string): Promise<AirLabsAirport[]> {
    const path = '/suggest';
    const suggestions = this.unwrap(await this.http.getJson(path, { q: query }), path);
    return isRecord(suggestions) ? this.recordList(suggestions.airports) : [];
  }

  async getAirportDelays(airportIata: string, minDelayMinutes = DEFAULT_DELAY_THRESHOLD_MINUTES): Promise<AirLabsFlight[]> {
    const path = '/delays';
    const json = await this.http.getJson(path, { dep_iata: airportIata, delay: minDelayMinutes });
    return this.recordList(this.unwrap(json, path));
  }

  /**
   * AirLabs wraps results in `response` and reports failures as `error`,
   * sometimes with a 200 status
   */
  private unwrap(json: unknown, path: string): unknown {
    if (!isRecord(json)) {
      throw new ToolError(ErrorCategory.DATA, 'AirLabs returned an unexpected response', { path });
    }

    const error = json.error;
    if (error !== undefined && error !== null) {
      const message = isRecord(error) && typeof error.message === 'string' ? error.message : String(error);
      throw new ToolError(ErrorCategory.API_ERROR, `AirLabs error: ${message}`, { path });
    }

    return json.response;
  }

  private recordList(value: unknown): Array<Record<string, unknown>> {
    return Array.isArray(value) ? value.filter(isRecord) : [];
  }
}
