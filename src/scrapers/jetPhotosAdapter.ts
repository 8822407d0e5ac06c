import { load } from 'cheerio';
import { RawCandidate } from '../models/contracts';
import { StructuralParseError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { SiteClient } from './siteClient';
import { AdapterContext, SourceAdapter } from './sourceAdapter';

const ICAO_IN_LOCATION = /- ([A-Z]{4})(?:,|\s|$)/;
const ISO_DATE = /\d{4}-\d{2}-\d{2}/;
const NO_RESULTS = /no photos (?:were )?found|no results|\b0 photos\b/i;

/**
 * jetphotos.com: one registration page, no pagination.
 */
export class JetPhotosAdapter implements SourceAdapter {
  readonly source = 'jetphotos' as const;

  constructor(private readonly client: SiteClient) {}

  async search(registration: string, _ctx: AdapterContext): Promise<RawCandidate[]> {
    const regPath = registration.replace(/-/g, '').toUpperCase();
    const html = await this.client.get(`/registration/${encodeURIComponent(regPath)}`);
    const $ = load(html);

    const cards = $('.result[data-photo]').toArray();
    if (cards.length === 0) {
      if (NO_RESULTS.test($('body').text())) {
        return [];
      }
      throw new StructuralParseError('JetPhotos page has neither result cards nor a no-results notice', this.source);
    }

    const photos: RawCandidate[] = [];
    for (const el of cards) {
      const card = $(el);
      const photoId = card.attr('data-photo');
      if (!photoId) continue;

      let thumbnailUrl: string | null = null;
      const src = card.find('.result__photo').attr('src');
      if (src) {
        thumbnailUrl = this.client.absolute(src);
      }

      const photographer = card.find('.result__infoListText--photographer a').first().text().trim() || null;

      let photoDate: string | null = null;
      for (const li of card.find('.desktop-only--block li').toArray()) {
        const text = $(li).text().replace(/\s+/g, ' ').trim();
        if (text.startsWith('Photo date:')) {
          photoDate = text.match(ISO_DATE)?.[0] ?? photoDate;
        }
      }

      let airportCode: string | null = null;
      for (const li of card.find('.result__section--info2-wrapper li').toArray()) {
        const text = $(li).text().replace(/\s+/g, ' ').trim();
        if (text.startsWith('Location:')) {
          airportCode = text.match(ICAO_IN_LOCATION)?.[1] ?? airportCode;
        }
      }

      photos.push({
        source: this.source,
        sourcePhotoId: photoId,
        registration,
        sourceUrl: `${this.client.baseUrl}/photo/${photoId}`,
        thumbnailUrl,
        fullImageUrl: null,
        photographer,
        airportCode,
        photoDate,
      });
    }

    if (photos.length === 0) {
      throw new StructuralParseError('JetPhotos result cards carry no photo ids', this.source);
    }

    logger.info(`JetPhotos: found ${photos.length} photos for ${registration}`);
    return photos;
  }
}
