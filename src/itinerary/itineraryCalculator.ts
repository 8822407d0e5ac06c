import { createHash } from 'crypto';
import { DateTime } from 'luxon';
import { AirportDirectory, airportDirectory } from '../airports/airportDirectory';
import { AirportRef, Flight, RawFlightRow } from '../models/contracts';
import { DataQualityError } from '../utils/errorHandler';
import {
  calendarDate,
  parseLocalDateTime,
  parseTimeOfDay,
  toLocalIso,
  toUtcIso,
} from '../time/timeUtils';

export function normalizeRegistration(raw: string): string {
  return raw.trim().toUpperCase().replace(/\s+/g, '');
}

/**
 * Natural key used to make re-imports idempotent: local departure date, flight
 * number (or route when there is none) and registration.
 */
export function flightNaturalKey(departureDate: string, flightNumber: string | null, route: string, registration: string): string {
  const ident = flightNumber ? flightNumber.replace(/\s+/g, '').toUpperCase() : route;
  return `${departureDate}|${ident}|${registration}`;
}

export function flightIdFor(naturalKey: string): string {
  return `flt_${createHash('sha1').update(naturalKey).digest('hex').slice(0, 12)}`;
}

interface ResolvedArrival {
  arrival: DateTime;
  timeOnly: boolean;
}

function resolveArrival(row: RawFlightRow, departure: DateTime, destination: AirportRef, rowIndex?: number): ResolvedArrival {
  if (row.arrivalLocal && row.arrivalLocal.trim()) {
    const time = parseTimeOfDay(row.arrivalLocal);
    if (time) {
      // Only a clock time: start from the departure's calendar date
      const arrival = DateTime.fromObject(
        { year: departure.year, month: departure.month, day: departure.day, ...time },
        { zone: destination.timezone }
      );
      return { arrival, timeOnly: true };
    }
    const arrival = parseLocalDateTime(row.arrivalLocal, destination.timezone);
    if (!arrival) {
      throw new DataQualityError(`Unparseable arrival time "${row.arrivalLocal}"`, rowIndex);
    }
    return { arrival, timeOnly: calendarDate(arrival) === calendarDate(departure) };
  }

  if (row.durationMinutes !== undefined && Number.isFinite(row.durationMinutes) && row.durationMinutes >= 0) {
    return { arrival: departure.plus({ minutes: row.durationMinutes }).setZone(destination.timezone), timeOnly: false };
  }

  throw new DataQualityError('Row has neither an arrival time nor a duration', rowIndex);
}

/**
 * Converts a raw imported row into a normalized flight with UTC instants and
 * the destination-local arrival date.
 *
 * An arrival that carries no date of its own is assumed to land on the
 * departure date; if that puts it before departure in UTC (red-eyes) it is
 * moved one calendar day forward, once. Anything still inverted is malformed.
 */
export function computeItinerary(
  row: RawFlightRow,
  options: { rowIndex?: number; directory?: AirportDirectory; importedAt?: string } = {}
): Flight {
  const { rowIndex } = options;
  const directory = options.directory ?? airportDirectory;

  const registration = normalizeRegistration(row.registration || '');
  if (!registration) {
    throw new DataQualityError('Missing registration', rowIndex);
  }
  if (!row.originCode?.trim() || !row.destinationCode?.trim()) {
    throw new DataQualityError('Missing origin or destination airport code', rowIndex);
  }
  if (!row.departureLocal?.trim()) {
    throw new DataQualityError('Missing departure time', rowIndex);
  }

  const origin = directory.normalize(row.originCode);
  const destination = directory.normalize(row.destinationCode);

  const departure = parseLocalDateTime(row.departureLocal, origin.timezone);
  if (!departure) {
    throw new DataQualityError(`Unparseable departure time "${row.departureLocal}"`, rowIndex);
  }

  let { arrival, timeOnly } = resolveArrival(row, departure, destination, rowIndex);

  if (arrival.toMillis() < departure.toMillis()) {
    if (!timeOnly) {
      throw new DataQualityError(
        `Arrival ${toLocalIso(arrival)} ${destination.timezone} is before departure ${toLocalIso(departure)} ${origin.timezone}`,
        rowIndex
      );
    }
    arrival = arrival.plus({ days: 1 });
    if (arrival.toMillis() < departure.toMillis()) {
      throw new DataQualityError(
        `Arrival is still before departure after rolling to the next day (${row.originCode} -> ${row.destinationCode})`,
        rowIndex
      );
    }
  }

  const flightNumber = row.flightNumber?.trim() ? row.flightNumber.trim().toUpperCase() : null;
  const departureDate = calendarDate(departure);
  const route = `${origin.iata ?? origin.raw}-${destination.iata ?? destination.raw}`;
  const naturalKey = flightNaturalKey(departureDate, flightNumber, route, registration);

  return {
    id: flightIdFor(naturalKey),
    naturalKey,
    registration,
    flightNumber,
    airline: row.airline?.trim() || null,
    aircraftType: row.aircraftType?.trim() || null,
    origin,
    destination,
    departureLocal: toLocalIso(departure),
    arrivalLocal: toLocalIso(arrival),
    originUtcOffsetMinutes: departure.offset,
    destinationUtcOffsetMinutes: arrival.offset,
    departureUtc: toUtcIso(departure),
    arrivalUtc: toUtcIso(arrival),
    departureDate,
    arrivalDate: calendarDate(arrival),
    degradedPrecision: !origin.known || !destination.known,
    importSource: row.importSource?.trim() || null,
    importedAt: options.importedAt ?? new Date().toISOString(),
  };
}
