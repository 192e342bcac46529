/**
 * AirLabs, GitHub and Open-Meteo Type Definitions
 * Only the fields the tools read are typed; everything else passes through
 */

/**
 * AirLabs flight and airport records are passed through as returned;
 * flight_iata, dep_iata, arr_iata, status and delayed are the fields users ask about
 */
export type AirLabsFlight = Record<string, unknown>;

export type AirLabsAirport = Record<string, unknown>;

export interface ScheduleQuery {
  depIata?: string;
  arrIata?: string;
  date?: string;
}

/**
 * GitHub contents API entry for a single file
 */
export interface GitHubFileContent {
  path: string;
  sha: string;
  /** Base64, absent for files over 1 MB */
  content?: string;
  encoding?: string;
}

/**
 * A note read from the vault
 */
export interface VaultNote {
  path: string;
  sha: string;
  content: string;
}

export interface WeatherQuery {
  latitude: number;
  longitude: number;
}

/**
 * Open-Meteo forecast body: current_weather plus hourly series
 */
export type OpenMeteoForecast = Record<string, unknown>;
