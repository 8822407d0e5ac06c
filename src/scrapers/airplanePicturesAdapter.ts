import { load } from 'cheerio';
import { RawCandidate } from '../models/contracts';
import { PermanentScrapeError, StructuralParseError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { SiteClient } from './siteClient';
import { AdapterContext, SourceAdapter, requestGate } from './sourceAdapter';

// "Sep 13th 2018 / 13.09.2018": the numeric part is used
const NUMERIC_DATE = /(\d{1,2})\.(\d{2})\.(\d{4})/;
const PHOTO_ID = /\/photo\/(\d+)/;
const ONCLICK_TARGET = /location\.href='([^']+)'/;
const NO_RESULTS = /no (?:photos|results|pictures) (?:were )?found|nothing found/i;

interface SearchFilter {
  apiata?: string;
  apicao?: string;
}

/**
 * airplane-pictures.net: the search form filters by airport server-side, so
 * one search runs per flown airport. Dates only appear on detail pages.
 */
export class AirplanePicturesAdapter implements SourceAdapter {
  readonly source = 'airplane_pictures' as const;

  constructor(private readonly client: SiteClient) {}

  async search(registration: string, ctx: AdapterContext): Promise<RawCandidate[]> {
    const nextSlot = requestGate(ctx);
    const seen = new Set<string>();
    const photos: RawCandidate[] = [];

    const filters: SearchFilter[] = Array.from(new Set(ctx.airportCodes.map(code => code.trim().toUpperCase())))
      .filter(code => code.length === 3 || code.length === 4)
      .map(code => (code.length === 3 ? { apiata: code } : { apicao: code }));
    if (filters.length === 0) {
      // Registration-only search
      filters.push({});
    }

    for (const filter of filters) {
      await nextSlot();
      const detailUrls = await this.searchOnce(registration, filter, seen);
      for (const url of detailUrls) {
        await nextSlot();
        const photo = await this.fetchDetail(url, registration);
        if (photo && !seen.has(photo.sourcePhotoId)) {
          seen.add(photo.sourcePhotoId);
          photos.push(photo);
        }
      }
    }

    logger.info(
      `airplane-pictures.net: found ${photos.length} photos for ${registration}` +
        (filters[0].apiata || filters[0].apicao ? ` (searched ${filters.length} airports)` : '')
    );
    return photos;
  }

  private async searchOnce(registration: string, filter: SearchFilter, seen: Set<string>): Promise<string[]> {
    const form: Record<string, string> = { apreg: registration };
    if (filter.apiata) form.apiata = filter.apiata;
    if (filter.apicao) form.apicao = filter.apicao;
    const label = [registration, filter.apiata, filter.apicao].filter(Boolean).join('/');

    const html = await this.client.postForm('/search', form);
    const $ = load(html);
    const cards = $('.card.ap-card').toArray();

    if (cards.length === 0) {
      if (NO_RESULTS.test($('body').text())) {
        logger.debug(`airplane-pictures.net: no results for ${label}`);
        return [];
      }
      throw new StructuralParseError(`airplane-pictures.net search for ${label} has no cards and no empty-result notice`, this.source);
    }

    const urls: string[] = [];
    for (const el of cards) {
      const card = $(el);
      const target = (card.attr('onclick') ?? '').match(ONCLICK_TARGET)?.[1] ?? card.find("a[href*='/photo/']").first().attr('href');
      if (!target) continue;
      const photoId = target.match(PHOTO_ID)?.[1];
      if (!photoId || seen.has(photoId)) continue;
      urls.push(this.client.absolute(target));
    }
    return urls;
  }

  private async fetchDetail(url: string, registration: string): Promise<RawCandidate | null> {
    const photoId = url.match(PHOTO_ID)?.[1];
    if (!photoId) return null;

    let html: string;
    try {
      html = await this.client.get(url);
    } catch (error) {
      if (error instanceof PermanentScrapeError && error.reason === 'no_results') {
        logger.debug(`airplane-pictures.net detail page gone: ${url}`);
        return null;
      }
      throw error;
    }

    const $ = load(html);
    const src = $('img[src*="/images/uploaded-images/"]').first().attr('src');

    let photoDate: string | null = null;
    let airportCode: string | null = null;
    let photographer: string | null = null;

    // Info table rows: label, icon, value
    for (const rowEl of $('tr').toArray()) {
      const cells = $(rowEl).find('td').toArray();
      if (cells.length < 2) continue;
      const label = $(cells[0]).text().trim().toLowerCase().replace(/:$/, '');
      const value = $(cells[cells.length - 1]).text().trim();

      if (label === 'taken' && !photoDate) {
        const date = value.match(NUMERIC_DATE);
        if (date) {
          photoDate = `${date[1].padStart(2, '0')}.${date[2]}.${date[3]}`;
        }
      } else if (label === 'iata' && !airportCode && /^[A-Za-z]{3}$/.test(value)) {
        airportCode = value.toUpperCase();
      } else if (label === 'icao' && !airportCode && /^[A-Za-z]{4}$/.test(value)) {
        airportCode = value.toUpperCase();
      } else if (label === 'photographer' && !photographer && value) {
        photographer = value;
      }
    }

    return {
      source: this.source,
      sourcePhotoId: photoId,
      registration,
      sourceUrl: url,
      thumbnailUrl: src ? this.client.absolute(src) : null,
      fullImageUrl: null,
      photographer,
      airportCode,
      photoDate,
    };
  }
}
