import * as fs from 'fs-extra';
import { IANAZone } from 'luxon';
import { AirportDirectory, AirportRecord } from './airportDirectory';
import { logger } from '../utils/logger';

export interface AirportLoadResult {
  loaded: number;
  skipped: number;
}

function isRecordLike(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Turns one entry of an airport file into a record, or null when its codes
 * or zone are unusable. `icaoKey` is the object key for files keyed by ICAO.
 */
export function parseAirportEntry(entry: unknown, icaoKey?: string): AirportRecord | null {
  if (!isRecordLike(entry)) return null;

  const icao = (text(entry.icao) || text(icaoKey)).toUpperCase();
  const iata = text(entry.iata).toUpperCase();
  const tz = text(entry.tz);
  if (!/^[A-Z0-9]{4}$/.test(icao)) return null;
  if (iata && !/^[A-Z0-9]{3}$/.test(iata)) return null;
  if (!tz || !IANAZone.isValidZone(tz)) return null;

  return { iata: iata || null, icao, tz, name: text(entry.name) || icao };
}

/**
 * Reads an airport file and merges it into `directory`. Accepts a list of
 * records or an object keyed by ICAO code (`{ "KJFK": { "iata": "JFK", ... } }`).
 */
export async function loadAirportData(filePath: string, directory: AirportDirectory): Promise<AirportLoadResult> {
  const data: unknown = await fs.readJson(filePath);

  let entries: Array<[unknown, string | undefined]>;
  if (Array.isArray(data)) {
    entries = data.map((entry): [unknown, string | undefined] => [entry, undefined]);
  } else if (isRecordLike(data)) {
    entries = Object.entries(data).map(([key, entry]): [unknown, string | undefined] => [entry, key]);
  } else {
    throw new Error(`Airport file ${filePath} must hold a list or an object keyed by ICAO code`);
  }

  const records: AirportRecord[] = [];
  for (const [entry, key] of entries) {
    const record = parseAirportEntry(entry, key);
    if (record) records.push(record);
  }
  directory.extend(records);

  const skipped = entries.length - records.length;
  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} airport record(s) in ${filePath} with bad codes or time zones`);
  }
  logger.info(`Loaded ${records.length} airport record(s) from ${filePath}; ${directory.size} known`);
  return { loaded: records.length, skipped };
}
