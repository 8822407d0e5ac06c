import { MatchingConfig } from '../config/config';
import { Flight, RawFlightRow } from '../models/contracts';
import { rescoreRegistration } from '../matching/matchScorer';
import { PhotoStore } from '../storage/photoStore';
import { DataQualityError, NotFoundError, errorMessage } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { computeItinerary } from './itineraryCalculator';

export interface RowError {
  rowIndex: number;
  message: string;
}

export interface ImportResult {
  imported: number;
  skipped: number;
  errors: RowError[];
  registrations: string[];
  jobsCreated: number;
}

/** Whatever creates scrape jobs for newly seen registrations. */
export interface JobScheduler {
  scheduleRegistrations(registrations: string[]): Promise<number>;
}

const STRING_FIELDS = [
  'registration',
  'originCode',
  'destinationCode',
  'departureLocal',
  'arrivalLocal',
  'flightNumber',
  'airline',
  'aircraftType',
  'importSource',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Validates one element of an import payload into a raw row. Missing values
 * are left for the itinerary calculator to report.
 */
export function toRawFlightRow(value: unknown, rowIndex: number): RawFlightRow {
  if (!isRecord(value)) {
    throw new DataQualityError('Row is not an object', rowIndex);
  }
  const text = (key: (typeof STRING_FIELDS)[number]): string | undefined => {
    const field = value[key];
    if (field === undefined || field === null) return undefined;
    if (typeof field === 'string') return field;
    if (typeof field === 'number') return String(field);
    throw new DataQualityError(`Field ${key} must be a string`, rowIndex);
  };

  let durationMinutes: number | undefined;
  const duration = value.durationMinutes;
  if (typeof duration === 'number') {
    durationMinutes = duration;
  } else if (typeof duration === 'string' && duration.trim() && Number.isFinite(Number(duration))) {
    durationMinutes = Number(duration);
  }

  return {
    registration: text('registration') ?? '',
    originCode: text('originCode') ?? '',
    destinationCode: text('destinationCode') ?? '',
    departureLocal: text('departureLocal') ?? '',
    arrivalLocal: text('arrivalLocal'),
    durationMinutes,
    flightNumber: text('flightNumber'),
    airline: text('airline'),
    aircraftType: text('aircraftType'),
    importSource: text('importSource'),
  };
}

export class FlightImporter {
  constructor(
    private readonly store: PhotoStore,
    private readonly scheduler: JobScheduler,
    private readonly matching: MatchingConfig
  ) {}

  /**
   * Normalizes and stores a batch. Malformed rows are reported and skipped,
   * duplicates of stored flights are counted as skipped.
   */
  async importFlights(rows: unknown[], importSource?: string): Promise<ImportResult> {
    const errors: RowError[] = [];
    const gained = new Set<string>();
    let imported = 0;
    let skipped = 0;
    const importedAt = new Date().toISOString();

    for (let rowIndex = 0; rowIndex < rows.length; rowIndex++) {
      let flight: Flight;
      try {
        const row = toRawFlightRow(rows[rowIndex], rowIndex);
        if (importSource && !row.importSource) {
          row.importSource = importSource;
        }
        flight = computeItinerary(row, { rowIndex, importedAt });
      } catch (error) {
        if (error instanceof DataQualityError) {
          errors.push({ rowIndex, message: error.message });
          logger.warn(`Import row ${rowIndex} skipped: ${error.message}`);
          continue;
        }
        throw error;
      }

      const { created } = await this.store.upsertFlight(flight);
      if (created) {
        imported++;
        gained.add(flight.registration);
      } else {
        skipped++;
      }
    }

    const registrations = Array.from(gained).sort();
    const jobsCreated = registrations.length > 0 ? await this.scheduler.scheduleRegistrations(registrations) : 0;
    for (const registration of registrations) {
      await rescoreRegistration(this.store, registration, this.matching);
    }

    logger.info(
      `Imported ${imported} flight(s), skipped ${skipped} duplicate(s), ${errors.length} bad row(s); ` +
        `${registrations.length} registration(s), ${jobsCreated} new scrape job(s)`
    );
    return { imported, skipped, errors, registrations, jobsCreated };
  }

  async deleteFlight(id: string): Promise<Flight> {
    const removed = await this.store.deleteFlight(id);
    if (!removed) {
      throw new NotFoundError(`Flight ${id} not found`);
    }
    await rescoreRegistration(this.store, removed.registration, this.matching);
    logger.info(`Flight ${id} (${removed.registration} ${removed.departureDate}) deleted`);
    return removed;
  }

  /**
   * Clears flights, jobs and run history plus every undecided or rejected
   * candidate. Approved photos stay in the library.
   */
  async resetAll(): Promise<void> {
    try {
      await this.store.reset();
    } catch (error) {
      logger.error(`Reset failed: ${errorMessage(error)}`);
      throw error;
    }
  }
}
