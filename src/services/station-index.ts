/**
 * Station Index
 * Pure lookup over a station directory: lower-cased names and synonyms to codes
 */

import { isRecord } from '../core/http-client.js';
import { findCloseMatch } from '../utils/fuzzy-match.js';
import type { StationRecord } from '../types/ns.types.js';

export interface StationMatch {
  code: string;
  /** Index key that matched */
  key: string;
  score: number;
  kind: 'exact' | 'fuzzy';
}

/**
 * Map every lower-cased name and synonym to its station code.
 * When two stations share a label the first one keeps it.
 */
export function buildStationIndex(records: readonly StationRecord[]): Map<string, string> {
  const index = new Map<string, string>();

  for (const record of records) {
    for (const label of [...record.names, ...record.synonyms]) {
      const key = label.trim().toLowerCase();
      if (key && !index.has(key)) {
        index.set(key, record.code);
      }
    }
  }

  return index;
}

/**
 * Exact key lookup first, then the best fuzzy key at or above `cutoff`
 */
export function matchStation(records: readonly StationRecord[], query: string, cutoff: number): StationMatch | null {
  const key = query.trim().toLowerCase();
  if (!key) return null;

  const index = buildStationIndex(records);

  const exact = index.get(key);
  if (exact !== undefined) {
    return { code: exact, key, score: 1, kind: 'exact' };
  }

  const close = findCloseMatch(key, index.keys(), cutoff);
  if (!close) return null;

  const code = index.get(close.candidate);
  return code === undefined ? null : { code, key: close.candidate, score: close.score, kind: 'fuzzy' };
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string' && item.trim() !== '');
}

/**
 * Normalize one raw directory entry; entries without a code are dropped
 */
export function toStationRecord(raw: unknown): StationRecord | null {
  if (!isRecord(raw)) return null;

  const code = raw.code;
  if (typeof code !== 'string' || !code.trim()) return null;

  const names: string[] = [];
  const namen = raw.namen;
  if (isRecord(namen)) {
    for (const field of ['lang', 'middel', 'kort'] as const) {
      const name = namen[field];
      if (typeof name === 'string' && name.trim()) names.push(name);
    }
  }

  const record: StationRecord = {
    code: code.trim(),
    names,
    synonyms: stringList(raw.synoniemen),
  };
  const { UICCode: uicCode, land: country } = raw;
  if ((typeof uicCode === 'string' && uicCode) || typeof uicCode === 'number') record.uicCode = String(uicCode);
  if (typeof country === 'string' && country) record.country = country;

  return record;
}

/**
 * Accept both a bare station list and a `{ payload: [...] }` envelope.
 * Returns null when neither shape is present.
 */
export function unwrapStationList(json: unknown): StationRecord[] | null {
  let list: unknown[];
  if (Array.isArray(json)) {
    list = json;
  } else if (isRecord(json) && Array.isArray(json.payload)) {
    list = json.payload;
  } else {
    return null;
  }

  const records: StationRecord[] = [];
  for (const raw of list) {
    const record = toStationRecord(raw);
    if (record) records.push(record);
  }
  return records;
}
