/**
 * NS Service
 * Tool-facing railway operations: every station argument goes through the
 * StationResolver, trip results go through the TripRanker
 */

import { ErrorHandler } from '../core/error-handler.js';
import { NsClient, BoardQuery } from './ns-client.js';
import { StationResolver } from './station-resolver.js';
import { rankTrips } from './trip-ranker.js';
import type { NsConfig } from '../core/config.js';
import type {
  BoardSearchParams,
  PriceSearchParams,
  StationRecord,
  StationResolution,
  TripCandidate,
  TripSearchParams,
} from '../types/ns.types.js';

export interface RankedTrips {
  fromStation: string;
  toStation: string;
  viaStation?: string;
  trips: TripCandidate[];
}

export class NsService {
  constructor(
    private readonly client: NsClient,
    private readonly resolver: StationResolver,
    private readonly preferredCategories: readonly string[]
  ) {}

  async resolveStation(query: string): Promise<StationResolution> {
    return this.resolver.resolve(query);
  }

  async listStations(query?: string, limit?: number): Promise<StationRecord[]> {
    return this.client.searchStations(query, limit);
  }

  async getDepartures(params: BoardSearchParams): Promise<Record<string, unknown>> {
    const code = await this.resolver.resolveOrThrow(params.station);
    return this.client.getDepartures(toBoardQuery(code, params));
  }

  async getArrivals(params: BoardSearchParams): Promise<Record<string, unknown>> {
    const code = await this.resolver.resolveOrThrow(params.station);
    return this.client.getArrivals(toBoardQuery(code, params));
  }

  /**
   * Resolve every station independently, fetch trip advice, rank it
   */
  async planTrip(params: TripSearchParams): Promise<RankedTrips> {
    const [fromStation, toStation, viaStation] = await Promise.all([
      this.resolver.resolveOrThrow(params.fromStation),
      this.resolver.resolveOrThrow(params.toStation),
      params.viaStation ? this.resolver.resolveOrThrow(params.viaStation) : Promise.resolve(undefined),
    ]);

    const trips = await this.client.searchTrips({
      fromStation,
      toStation,
      viaStation,
      dateTime: params.dateTime,
      searchForArrival: params.searchForArrival,
    });

    const result: RankedTrips = {
      fromStation,
      toStation,
      trips: rankTrips(trips, this.preferredCategories),
    };
    if (viaStation) result.viaStation = viaStation;
    return result;
  }

  async getPrice(params: PriceSearchParams): Promise<unknown> {
    const [fromStation, toStation] = await Promise.all([
      this.resolver.resolveOrThrow(params.fromStation),
      this.resolver.resolveOrThrow(params.toStation),
    ]);
    return this.client.getPrice({ ...params, fromStation, toStation });
  }

  async getOvFiets(station: string): Promise<unknown[]> {
    const code = await this.resolver.resolveOrThrow(station);
    return this.client.getOvFiets(code);
  }

  async getDisruptions(station: string): Promise<unknown[]> {
    const code = await this.resolver.resolveOrThrow(station);
    return this.client.getStationDisruptions(code);
  }
}

/**
 * UIC numbers go out as uicCode, letter codes as station
 */
function toBoardQuery(code: string, params: BoardSearchParams): BoardQuery {
  const location = /^\d+$/.test(code) ? { uicCode: code } : { station: code };
  return { ...location, dateTime: params.dateTime, maxJourneys: params.maxJourneys };
}

export function createNsService(config: NsConfig, errorHandler: ErrorHandler): NsService {
  const client = new NsClient(config);
  const resolver = new StationResolver(client, errorHandler, {
    fuzzyCutoff: config.fuzzyCutoff,
    directoryCacheTtlMs: config.stationCacheTtlMs,
  });
  return new NsService(client, resolver, config.preferredCategories);
}
