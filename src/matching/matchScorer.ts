import { AirportDirectory, airportDirectory } from '../airports/airportDirectory';
import { MatchingConfig } from '../config/config';
import { CandidatePhoto, Flight, MatchReasons } from '../models/contracts';
import { CandidateMatch, PhotoStore } from '../storage/photoStore';
import { daysBetween } from '../time/timeUtils';
import { logger } from '../utils/logger';

export const REGISTRATION_WEIGHT = 30;
export const AIRPORT_WEIGHT = 30;
/** Date-proximity points by whole-day distance from the local departure date. */
export const DATE_WEIGHTS: readonly number[] = [40, 20, 10, 5];

export const DEFAULT_MATCHING: MatchingConfig = {
  lowConfidenceThreshold: 60,
  maxDateWindowDays: 3,
};

/** The parts of a candidate the scorer reads. */
export type ScorableCandidate = Pick<CandidatePhoto, 'registration' | 'airportCode' | 'photoDate'>;

export interface FlightScore {
  flight: Flight;
  score: number;
  reasons: MatchReasons;
}

export function dateProximityPoints(distanceDays: number, maxWindowDays: number = DEFAULT_MATCHING.maxDateWindowDays): number {
  if (distanceDays < 0 || distanceDays > maxWindowDays) return 0;
  return DATE_WEIGHTS[distanceDays] ?? 0;
}

export function scoreAgainstFlight(
  candidate: ScorableCandidate,
  flight: Flight,
  options: { matching?: MatchingConfig; directory?: AirportDirectory } = {}
): FlightScore {
  const matching = options.matching ?? DEFAULT_MATCHING;
  const directory = options.directory ?? airportDirectory;

  // Registration is the join key, so it always contributes the base weight
  let score = REGISTRATION_WEIGHT;

  let airport: string | null = null;
  if (candidate.airportCode) {
    if (directory.matches(candidate.airportCode, flight.origin)) {
      airport = 'origin';
    } else if (directory.matches(candidate.airportCode, flight.destination)) {
      airport = 'destination';
    }
  }
  if (airport) score += AIRPORT_WEIGHT;

  let dateDistanceDays: number | null = null;
  if (candidate.photoDate) {
    dateDistanceDays = daysBetween(candidate.photoDate, flight.departureDate);
    score += dateProximityPoints(dateDistanceDays, matching.maxDateWindowDays);
  }

  return {
    flight,
    score: Math.max(0, Math.min(100, score)),
    reasons: {
      registration: true,
      airport,
      dateDistanceDays,
      degradedPrecision: flight.degradedPrecision,
    },
  };
}

/**
 * Highest score wins; ties go to the earliest departure, then the flight id.
 */
export function selectBestMatch(scores: FlightScore[]): FlightScore | null {
  let best: FlightScore | null = null;
  for (const entry of scores) {
    if (!best) {
      best = entry;
      continue;
    }
    if (entry.score !== best.score) {
      if (entry.score > best.score) best = entry;
      continue;
    }
    const byDeparture = entry.flight.departureUtc.localeCompare(best.flight.departureUtc);
    if (byDeparture < 0 || (byDeparture === 0 && entry.flight.id < best.flight.id)) {
      best = entry;
    }
  }
  return best;
}

/**
 * Scores a candidate against every flight of its registration. Without any
 * flight it scores 0 and stays unmatched.
 */
export function scoreCandidate(
  candidate: ScorableCandidate,
  flights: Flight[],
  options: { matching?: MatchingConfig; directory?: AirportDirectory } = {}
): CandidateMatch {
  const sameRegistration = flights.filter(f => f.registration === candidate.registration);
  const best = selectBestMatch(sameRegistration.map(f => scoreAgainstFlight(candidate, f, options)));
  if (!best) {
    return { score: 0, matchedFlightId: null, matchReasons: null };
  }
  return { score: best.score, matchedFlightId: best.flight.id, matchReasons: best.reasons };
}

export function isLowConfidence(score: number, matching: MatchingConfig = DEFAULT_MATCHING): boolean {
  return score < matching.lowConfidenceThreshold;
}

function sameMatch(candidate: CandidatePhoto, match: CandidateMatch): boolean {
  return (
    candidate.score === match.score &&
    candidate.matchedFlightId === match.matchedFlightId &&
    JSON.stringify(candidate.matchReasons) === JSON.stringify(match.matchReasons)
  );
}

/**
 * Recomputes score and matched flight for every candidate of a registration.
 * Review state is left as it is.
 */
export async function rescoreRegistration(
  store: PhotoStore,
  registration: string,
  matching: MatchingConfig = DEFAULT_MATCHING
): Promise<number> {
  const [flights, candidates] = await Promise.all([
    store.listFlights(registration),
    store.listCandidates({ registration }),
  ]);

  const updates = new Map<string, CandidateMatch>();
  for (const candidate of candidates) {
    const match = scoreCandidate(candidate, flights, { matching });
    if (!sameMatch(candidate, match)) {
      updates.set(candidate.id, match);
    }
  }

  const changed = await store.updateCandidateMatches(updates);
  if (changed > 0) {
    logger.debug(`Rescored ${changed} candidate(s) for ${registration}`);
  }
  return changed;
}
