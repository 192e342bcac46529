/**
 * Station Resolver
 * Maps free text, short codes and UIC numbers to a canonical NS station code.
 *
 * Strategies run in order and the first hit wins:
 *   1. numeric input is a UIC code, passed through
 *   2. up to six upper-case letters is a station code, passed through
 *   3. remote directory search for the single best match
 *   4. exact, then fuzzy, lookup over the full directory
 * Tiers 3 and 4 never throw: a failure is recorded and the next tier runs.
 */

import { ErrorHandler, UnresolvedStationError } from '../core/error-handler.js';
import { matchStation } from './station-index.js';
import type { StationRecord, StationResolution, TierResult } from '../types/ns.types.js';

/**
 * Station directory search; no query returns the whole directory
 */
export interface StationDirectory {
  searchStations(query?: string, limit?: number): Promise<StationRecord[]>;
}

export interface StationResolverOptions {
  fuzzyCutoff: number;
  /** Reuse the full directory for this long; 0 fetches it on every fallback */
  directoryCacheTtlMs?: number;
  now?: () => number;
}

const MAX_SHORT_CODE_LENGTH = 6;
const UIC_CODE_PATTERN = /^\d+$/;
const SHORT_CODE_PATTERN = /^[A-Z]+$/;

export class StationResolver {
  private directoryCache: { records: StationRecord[]; expiresAt: number } | null = null;
  private readonly now: () => number;

  constructor(
    private readonly directory: StationDirectory,
    private readonly errorHandler: ErrorHandler,
    private readonly options: StationResolverOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async resolve(query: string): Promise<StationResolution> {
    const trimmed = query.trim();
    if (!trimmed) {
      return { resolved: false, query, failures: ['empty query'] };
    }

    const bypass = this.tryBypass(trimmed);
    if (bypass.kind === 'found') {
      return { resolved: true, query, code: bypass.code, tier: bypass.tier };
    }

    const failures: string[] = [];
    const tiers: Array<{ name: string; run: () => Promise<TierResult> }> = [
      { name: 'search', run: () => this.trySearch(trimmed) },
      { name: 'local', run: () => this.tryLocalMatch(trimmed) },
    ];

    for (const tier of tiers) {
      const result = await tier.run();

      if (result.kind === 'found') {
        return { resolved: true, query, code: result.code, tier: result.tier };
      }

      if (result.kind === 'transient_error') {
        failures.push(`${tier.name}: ${result.detail}`);
        this.errorHandler.logWarning('Station resolution tier failed, falling through', {
          query: trimmed,
          tier: tier.name,
          detail: result.detail,
        });
      } else {
        failures.push(`${tier.name}: no match`);
      }
    }

    return { resolved: false, query, failures };
  }

  /**
   * Resolve or throw UnresolvedStationError naming the original query
   */
  async resolveOrThrow(query: string): Promise<string> {
    const resolution = await this.resolve(query);
    if (!resolution.resolved) {
      throw new UnresolvedStationError(query, resolution.failures);
    }
    return resolution.code;
  }

  clearDirectoryCache(): void {
    this.directoryCache = null;
  }

  private tryBypass(query: string): TierResult {
    if (UIC_CODE_PATTERN.test(query)) {
      return { kind: 'found', code: query, tier: 'uic' };
    }
    if (query.length <= MAX_SHORT_CODE_LENGTH && SHORT_CODE_PATTERN.test(query)) {
      return { kind: 'found', code: query, tier: 'code' };
    }
    return { kind: 'not_found' };
  }

  private async trySearch(query: string): Promise<TierResult> {
    try {
      const records = await this.directory.searchStations(query, 1);
      const first = records[0];
      return first ? { kind: 'found', code: first.code, tier: 'search' } : { kind: 'not_found' };
    } catch (error) {
      return { kind: 'transient_error', detail: describe(error) };
    }
  }

  private async tryLocalMatch(query: string): Promise<TierResult> {
    let records: StationRecord[];
    try {
      records = await this.loadDirectory();
    } catch (error) {
      return { kind: 'transient_error', detail: describe(error) };
    }

    const match = matchStation(records, query, this.options.fuzzyCutoff);
    if (!match) return { kind: 'not_found' };

    return { kind: 'found', code: match.code, tier: match.kind };
  }

  private async loadDirectory(): Promise<StationRecord[]> {
    const ttl = this.options.directoryCacheTtlMs ?? 0;
    if (ttl > 0 && this.directoryCache && this.directoryCache.expiresAt > this.now()) {
      return this.directoryCache.records;
    }

    const records = await this.directory.searchStations();
    if (ttl > 0) {
      this.directoryCache = { records, expiresAt: this.now() + ttl };
    }
    return records;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
