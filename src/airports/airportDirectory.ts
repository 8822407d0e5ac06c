import airportData from './airports.json';
import { AirportRef } from '../models/contracts';

export interface AirportRecord {
  /** Null for fields that only carry an ICAO code. */
  iata: string | null;
  icao: string;
  tz: string;
  name: string;
}

export const FALLBACK_TIMEZONE = 'UTC';

/**
 * Static IATA <-> ICAO lookup with the IANA zone of each airport.
 */
export class AirportDirectory {
  private byIata = new Map<string, AirportRecord>();
  private byIcao = new Map<string, AirportRecord>();

  constructor(records: AirportRecord[]) {
    this.extend(records);
  }

  get size(): number {
    return this.byIcao.size;
  }

  /**
   * Adds records on top of the bundled set. A record replaces an earlier one
   * with the same ICAO code, and takes over its IATA code.
   */
  extend(records: AirportRecord[]): void {
    for (const record of records) {
      const icao = record.icao.toUpperCase();
      const previous = this.byIcao.get(icao);
      if (previous?.iata && this.byIata.get(previous.iata) === previous) {
        this.byIata.delete(previous.iata);
      }
      this.byIcao.set(icao, record);
      if (record.iata) {
        this.byIata.set(record.iata.toUpperCase(), record);
      }
    }
  }

  lookup(code: string): AirportRecord | null {
    const clean = code.trim().toUpperCase();
    if (clean.length === 3) return this.byIata.get(clean) ?? null;
    if (clean.length === 4) return this.byIcao.get(clean) ?? null;
    return null;
  }

  /**
   * Unknown codes pass through unnormalized with known=false and a UTC zone.
   */
  normalize(code: string): AirportRef {
    const raw = code.trim().toUpperCase();
    const record = this.lookup(raw);
    if (!record) {
      return {
        raw,
        iata: raw.length === 3 ? raw : null,
        icao: raw.length === 4 ? raw : null,
        timezone: FALLBACK_TIMEZONE,
        known: false,
      };
    }
    return { raw, iata: record.iata, icao: record.icao, timezone: record.tz, known: true };
  }

  /**
   * Converts any airport code to IATA. Returns the cleaned input when not found.
   */
  toIata(code: string): string {
    const clean = code.trim().toUpperCase();
    return this.lookup(clean)?.iata ?? clean;
  }

  /**
   * Whether a scraped airport code refers to the given airport, in either code system.
   */
  matches(code: string, airport: AirportRef): boolean {
    const clean = code.trim().toUpperCase();
    if (!clean) return false;
    const candidates = [airport.raw, airport.iata, airport.icao].filter((c): c is string => !!c);
    if (candidates.includes(clean)) return true;
    const record = this.lookup(clean);
    if (!record) return false;
    return (record.iata !== null && record.iata === airport.iata) || record.icao === airport.icao;
  }
}

export const airportDirectory = new AirportDirectory(airportData);
