import { MatchingConfig } from '../config/config';
import { CandidatePhoto, Flight } from '../models/contracts';
import { PhotoStore } from '../storage/photoStore';
import { nowIso } from '../time/timeUtils';
import { NotFoundError, ReviewTransitionError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export type ReviewFilter = 'default' | 'low' | 'library';

export const REVIEW_FILTERS: readonly ReviewFilter[] = ['default', 'low', 'library'];

export interface ReviewItem {
  candidate: CandidatePhoto;
  flight: Flight | null;
}

export interface ReviewView {
  filter: ReviewFilter;
  item: ReviewItem | null;
  index: number;
  total: number;
  previousId: string | null;
  nextId: string | null;
}

export interface ViewOptions {
  index?: number;
  candidateId?: string;
}

export function isReviewFilter(value: unknown): value is ReviewFilter {
  return typeof value === 'string' && REVIEW_FILTERS.some(filter => filter === value);
}

/**
 * Score descending, then matched flight departure date ascending with
 * unmatched candidates last, then candidate id.
 */
export function compareForReview(
  a: CandidatePhoto,
  b: CandidatePhoto,
  flights: Map<string, Flight>
): number {
  if (a.score !== b.score) return b.score - a.score;
  const aDate = a.matchedFlightId ? flights.get(a.matchedFlightId)?.departureDate ?? null : null;
  const bDate = b.matchedFlightId ? flights.get(b.matchedFlightId)?.departureDate ?? null : null;
  if (aDate !== bDate) {
    if (aDate === null) return 1;
    if (bDate === null) return -1;
    return aDate < bDate ? -1 : 1;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Review state machine over scored candidates: pending -> approved | rejected.
 * Decisions are one-way; deleting a candidate is the only reversal.
 */
export class ReviewQueue {
  constructor(private readonly store: PhotoStore, private readonly matching: MatchingConfig) {}

  async list(filter: ReviewFilter = 'default'): Promise<ReviewItem[]> {
    const [candidates, flights] = await Promise.all([
      this.store.listCandidates({ reviewStates: filter === 'library' ? ['approved'] : ['pending'] }),
      this.store.listFlights(),
    ]);
    const byId = new Map(flights.map(flight => [flight.id, flight]));
    const threshold = this.matching.lowConfidenceThreshold;

    return candidates
      .filter(candidate => {
        if (filter === 'default') return candidate.score >= threshold;
        if (filter === 'low') return candidate.score < threshold;
        return true;
      })
      .sort((a, b) => compareForReview(a, b, byId))
      .map(candidate => ({
        candidate,
        flight: candidate.matchedFlightId ? byId.get(candidate.matchedFlightId) ?? null : null,
      }));
  }

  /**
   * One position in a view. A candidate id deep link wins over an index; an
   * out-of-range index is clamped.
   */
  async view(filter: ReviewFilter = 'default', options: ViewOptions = {}): Promise<ReviewView> {
    const items = await this.list(filter);
    if (items.length === 0) {
      return { filter, item: null, index: 0, total: 0, previousId: null, nextId: null };
    }

    let index = 0;
    if (options.candidateId) {
      const found = items.findIndex(item => item.candidate.id === options.candidateId);
      if (found >= 0) {
        index = found;
      } else if (options.index !== undefined) {
        index = options.index;
      }
    } else if (options.index !== undefined) {
      index = options.index;
    }
    index = Math.min(items.length - 1, Math.max(0, Number.isFinite(index) ? Math.floor(index) : 0));

    return {
      filter,
      item: items[index],
      index,
      total: items.length,
      previousId: index > 0 ? items[index - 1].candidate.id : null,
      nextId: index < items.length - 1 ? items[index + 1].candidate.id : null,
    };
  }

  async pendingCount(): Promise<number> {
    return (await this.list('default')).length;
  }

  async approve(id: string, comment?: string | null): Promise<CandidatePhoto> {
    return this.decide(id, 'approved', comment);
  }

  async reject(id: string, comment?: string | null): Promise<CandidatePhoto> {
    return this.decide(id, 'rejected', comment);
  }

  async delete(id: string): Promise<void> {
    const removed = await this.store.deleteCandidate(id);
    if (!removed) {
      throw new NotFoundError(`Candidate ${id} not found`);
    }
    logger.info(`Candidate ${id} deleted`);
  }

  private async decide(id: string, to: 'approved' | 'rejected', comment?: string | null): Promise<CandidatePhoto> {
    const note = comment?.trim() ? comment.trim() : null;
    const { candidate, applied } = await this.store.transitionReview(id, to, note, nowIso());
    if (!candidate) {
      throw new NotFoundError(`Candidate ${id} not found`);
    }
    if (!applied) {
      throw new ReviewTransitionError(`Candidate ${id} is already ${candidate.reviewState}`);
    }
    logger.info(`Candidate ${id} ${to}${note ? ` (${note})` : ''}`);
    return candidate;
  }
}
