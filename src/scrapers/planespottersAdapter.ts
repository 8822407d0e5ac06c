import { load } from 'cheerio';
import { RawCandidate } from '../models/contracts';
import { StructuralParseError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { SiteClient } from './siteClient';
import { AdapterContext, SourceAdapter } from './sourceAdapter';

const AIRPORT_PAIR = /\(([A-Z]{3})\s*\/\s*([A-Z]{4})\)/;
const NO_RESULTS = /no photos|nothing found|\b0 photos\b/i;

export class PlanespottersAdapter implements SourceAdapter {
  readonly source = 'planespotters' as const;

  constructor(private readonly client: SiteClient) {}

  async search(registration: string, _ctx: AdapterContext): Promise<RawCandidate[]> {
    const html = await this.client.get(`/photos/reg/${encodeURIComponent(registration)}`);
    const $ = load(html);

    const cards = $('.photo-card-clickable').toArray();
    if (cards.length === 0) {
      if (NO_RESULTS.test($('body').text())) {
        return [];
      }
      throw new StructuralParseError('Planespotters page has neither photo cards nor a no-photos notice', this.source);
    }

    const photos: RawCandidate[] = [];
    for (const el of cards) {
      const card = $(el);
      const photoId = card.attr('id');
      if (!photoId) continue;

      const photoPath = (card.attr('data-photo-url') ?? '').split('?')[0];
      const sourceUrl = photoPath ? this.client.absolute(photoPath) : `${this.client.baseUrl}/photo/${photoId}`;

      const src = card.find('img').first().attr('src');
      const photographer = card.find('.drop-shadow-lg').first().text().trim().replace(/^[©\s]+/, '') || null;

      let airportCode: string | null = null;
      const airportLink = card.find('a[href*="/photos/airport/"]').first();
      if (airportLink.length > 0) {
        const match = (airportLink.attr('title') ?? '').match(AIRPORT_PAIR) ?? airportLink.text().match(AIRPORT_PAIR);
        airportCode = match ? match[1] : null;
      }

      // Date links read day / month / year, or month / year only
      const dateParts = card
        .find('a[href*="/photos/date/"]')
        .toArray()
        .map(a => $(a).text().trim());
      let photoDate: string | null = null;
      if (dateParts.length >= 3) {
        photoDate = `${dateParts[0]} ${dateParts[1]} ${dateParts[2]}`;
      } else if (dateParts.length === 2) {
        photoDate = `1 ${dateParts[0]} ${dateParts[1]}`;
      }

      photos.push({
        source: this.source,
        sourcePhotoId: photoId,
        registration,
        sourceUrl,
        thumbnailUrl: src ? this.client.absolute(src) : null,
        fullImageUrl: null,
        photographer,
        airportCode,
        photoDate,
      });
    }

    if (photos.length === 0) {
      throw new StructuralParseError('Planespotters photo cards carry no ids', this.source);
    }

    logger.info(`Planespotters: found ${photos.length} photos for ${registration}`);
    return photos;
  }
}
