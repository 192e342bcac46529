/**
 * NS (Nederlandse Spoorwegen) API Type Definitions
 * Shapes used by the Reisinformatie and Places APIs
 */

/**
 * Station entry as returned by /reisinformatie-api/api/v2/stations
 */
export interface NsStation {
  code: string;
  UICCode?: string;
  land?: string;
  namen?: {
    lang?: string;
    middel?: string;
    kort?: string;
  };
  synoniemen?: string[];
  lat?: number;
  lng?: number;
}

/**
 * Normalized station directory record
 */
export interface StationRecord {
  code: string;
  uicCode?: string;
  country?: string;
  /** Long, medium and short names, in that order, without blanks */
  names: string[];
  synonyms: string[];
}

/**
 * One itinerary option from /reisinformatie-api/api/v3/trips.
 * Kept loose: the ranker reads `status` and `legs[].product.categoryCode`
 * and tolerates anything else being missing or malformed.
 */
export type TripCandidate = Record<string, unknown>;

export type ResolutionTier = 'uic' | 'code' | 'search' | 'exact' | 'fuzzy';

/**
 * Outcome of a single resolution strategy
 */
export type TierResult =
  | { kind: 'found'; code: string; tier: ResolutionTier }
  | { kind: 'not_found' }
  | { kind: 'transient_error'; detail: string };

export type StationResolution =
  | { resolved: true; query: string; code: string; tier: ResolutionTier }
  | { resolved: false; query: string; failures: string[] };

export type TravelClass = 1 | 2;

export type TravelType = 'single' | 'return';

export interface TripSearchParams {
  fromStation: string;
  toStation: string;
  viaStation?: string;
  dateTime?: string;
  searchForArrival?: boolean;
}

export interface PriceSearchParams {
  fromStation: string;
  toStation: string;
  travelClass?: TravelClass;
  travelType?: TravelType;
  adults?: number;
}

export interface BoardSearchParams {
  station: string;
  dateTime?: string;
  maxJourneys?: number;
}
