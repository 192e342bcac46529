/**
 * NS Client
 * Raw calls to the NS Reisinformatie and Places APIs
 */

import { HttpClient, isRecord } from '../core/http-client.js';
import { ErrorCategory, ToolError } from '../core/error-handler.js';
import { unwrapStationList } from './station-index.js';
import type { NsConfig } from '../core/config.js';
import type { StationDirectory } from './station-resolver.js';
import type { PriceSearchParams, StationRecord, TripCandidate, TripSearchParams } from '../types/ns.types.js';

const NS_PATHS = {
  STATIONS: '/reisinformatie-api/api/v2/stations',
  DEPARTURES: '/reisinformatie-api/api/v2/departures',
  ARRIVALS: '/reisinformatie-api/api/v2/arrivals',
  TRIPS: '/reisinformatie-api/api/v3/trips',
  PRICE: '/reisinformatie-api/api/v3/price',
  STATION_DISRUPTIONS: '/reisinformatie-api/api/v3/disruptions/station',
  OVFIETS: '/places-api/v2/ovfiets',
} as const;

export interface BoardQuery {
  /** Alphabetic station code */
  station?: string;
  uicCode?: string;
  dateTime?: string;
  maxJourneys?: number;
}

function invalidResponse(message: string, path: string): ToolError {
  return new ToolError(ErrorCategory.DATA, message, { path });
}

export class NsClient implements StationDirectory {
  private readonly http: HttpClient;

  constructor(config: NsConfig) {
    this.http = new HttpClient({
      serviceName: 'NS',
      baseUrl: config.gatewayUrl,
      timeoutMs: config.timeoutMs,
      headers: { 'Ocp-Apim-Subscription-Key': config.apiKey },
    });
  }

  async searchStations(query?: string, limit?: number): Promise<StationRecord[]> {
    const json = await this.http.getJson(NS_PATHS.STATIONS, { q: query, limit });
    const records = unwrapStationList(json);
    if (!records) {
      throw invalidResponse('NS stations response is not a station list', NS_PATHS.STATIONS);
    }
    return records;
  }

  async getDepartures(query: BoardQuery): Promise<Record<string, unknown>> {
    return this.getBoard(NS_PATHS.DEPARTURES, query);
  }

  async getArrivals(query: BoardQuery): Promise<Record<string, unknown>> {
    return this.getBoard(NS_PATHS.ARRIVALS, query);
  }

  async searchTrips(params: TripSearchParams): Promise<TripCandidate[]> {
    const json = await this.http.getJson(NS_PATHS.TRIPS, {
      fromStation: params.fromStation,
      toStation: params.toStation,
      viaStation: params.viaStation,
      dateTime: params.dateTime,
      searchForArrival: params.searchForArrival,
    });

    const trips = isRecord(json) ? json.trips : undefined;
    if (!Array.isArray(trips)) {
      throw invalidResponse('NS trips response did not include a trips array', NS_PATHS.TRIPS);
    }
    return trips.filter(isRecord);
  }

  async getPrice(params: PriceSearchParams): Promise<unknown> {
    const json = await this.http.getJson(NS_PATHS.PRICE, {
      fromStation: params.fromStation,
      toStation: params.toStation,
      travelClass: params.travelClass,
      travelType: params.travelType,
      adults: params.adults,
    });
    return isRecord(json) && json.payload !== undefined ? json.payload : json;
  }

  async getOvFiets(stationCode: string): Promise<unknown[]> {
    const json = await this.http.getJson(NS_PATHS.OVFIETS, { station_code: stationCode });
    const payload = isRecord(json) ? json.payload : json;
    if (!Array.isArray(payload)) {
      throw invalidResponse('NS OV-fiets response did not include a payload array', NS_PATHS.OVFIETS);
    }
    return payload;
  }

  async getStationDisruptions(stationCode: string): Promise<unknown[]> {
    const path = `${NS_PATHS.STATION_DISRUPTIONS}/${encodeURIComponent(stationCode)}`;
    const json = await this.http.getJson(path);
    if (!Array.isArray(json)) {
      throw invalidResponse('NS station disruptions response is not an array', path);
    }
    return json;
  }

  private async getBoard(path: string, query: BoardQuery): Promise<Record<string, unknown>> {
    const json = await this.http.getJson(path, {
      station: query.station,
      uicCode: query.uicCode,
      dateTime: query.dateTime,
      maxJourneys: query.maxJourneys,
    });

    const payload = isRecord(json) ? json.payload : undefined;
    if (!isRecord(payload)) {
      throw invalidResponse('NS response did not include a payload object', path);
    }
    return payload;
  }
}
