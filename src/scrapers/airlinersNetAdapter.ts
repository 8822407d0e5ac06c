import { load } from 'cheerio';
import { RawCandidate } from '../models/contracts';
import { PermanentScrapeError, StructuralParseError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { SiteClient } from './siteClient';
import { AdapterContext, SourceAdapter, requestGate } from './sourceAdapter';

export const AIRLINERS_MAX_PAGES = 5;

const LONG_DATE =
  /(January|February|March|April|May|June|July|August|September|October|November|December)\s+(\d{1,2}),?\s*(\d{4})/;
const AIRPORT_PAIR = /\(([A-Z]{3})\s*\/\s*[A-Z]{4}\)/;
const PHOTO_ID = /\/(\d+)(?:\?|$)/;
const NO_RESULTS = /no results|no photos found|did not match any/i;

/**
 * airliners.net search results, followed across up to five pages.
 */
export class AirlinersNetAdapter implements SourceAdapter {
  readonly source = 'airlinersnet' as const;

  constructor(private readonly client: SiteClient) {}

  async search(registration: string, ctx: AdapterContext): Promise<RawCandidate[]> {
    const nextSlot = requestGate(ctx);
    const photos: RawCandidate[] = [];

    for (let page = 1; page <= AIRLINERS_MAX_PAGES; page++) {
      await nextSlot();
      let html: string;
      try {
        html = await this.client.get('/search', { registrationActual: registration, page });
      } catch (error) {
        // A later page going missing keeps what the earlier pages found
        if (page > 1 && error instanceof PermanentScrapeError) break;
        throw error;
      }
      const $ = load(html);
      const rows = $('.ps-v2-results-display-detail-col').toArray();

      if (rows.length === 0) {
        if (page > 1 || NO_RESULTS.test($('body').text())) break;
        throw new StructuralParseError('Airliners.net search page has no result rows and no empty-result notice', this.source);
      }

      for (const el of rows) {
        const row = $(el);
        const link = row.find("a[href*='/photo/']").first();
        const href = link.attr('href');
        if (!href) continue;
        const photoId = href.match(PHOTO_ID)?.[1];
        if (!photoId) continue;

        const img = row.find("img[src*='imgproc'], img[data-src*='imgproc']").first();
        const thumb = img.attr('src') || img.attr('data-src');
        const thumbnailUrl = thumb ? this.client.absolute(thumb) : null;

        let airportCode: string | null = null;
        let photoDate: string | null = null;
        let photographer: string | null = null;
        for (const colEl of row.find('.ps-v2-results-col').toArray()) {
          const text = $(colEl).text().replace(/\s+/g, ' ').trim();
          if (text.includes('Location') || AIRPORT_PAIR.test(text)) {
            airportCode = text.match(AIRPORT_PAIR)?.[1] ?? airportCode;
            const date = text.match(LONG_DATE);
            if (date) {
              photoDate = `${date[1]} ${date[2]}, ${date[3]}`;
            }
          }
          if (text.includes('Photographer')) {
            photographer = text.replace('Photographer', '').trim() || photographer;
          }
        }

        photos.push({
          source: this.source,
          sourcePhotoId: photoId,
          registration,
          sourceUrl: this.client.absolute(href.split('?')[0]),
          thumbnailUrl,
          // Size suffix -0 is the full-resolution rendition
          fullImageUrl: thumbnailUrl ? thumbnailUrl.replace(/-\d\.jpg$/, '-0.jpg') : null,
          photographer,
          airportCode,
          photoDate,
        });
      }

      const hasNext = $('a[rel="next"]').length > 0 || $('.ps-v2-results-pagination-next a').length > 0;
      if (!hasNext) break;
    }

    logger.info(`Airliners.net: found ${photos.length} photos for ${registration}`);
    return photos;
  }
}
