import axios, { AxiosResponse } from 'axios';
import { SourceName } from '../models/contracts';
import { errorForStatus } from '../utils/errorCategorizer';
import { TransientScrapeError, errorMessage } from '../utils/errorHandler';

export interface SiteClientOptions {
  source: SourceName;
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
}

/**
 * Thin axios wrapper for one photo site. Every non-2xx status is turned into a
 * taxonomy error and network failures become transient errors.
 */
export class SiteClient {
  constructor(private readonly options: SiteClientOptions) {}

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  /** Resolves a site-relative href ("/photo/1", "//cdn/x.jpg") to an absolute URL. */
  absolute(href: string): string {
    if (href.startsWith('//')) return `https:${href}`;
    if (/^https?:\/\//i.test(href)) return href;
    return `${this.options.baseUrl}${href.startsWith('/') ? '' : '/'}${href}`;
  }

  async get(url: string, params?: Record<string, string | number>): Promise<string> {
    const target = this.absolute(url);
    return this.send(target, () =>
      axios.get<string>(target, {
        params,
        timeout: this.options.timeoutMs,
        headers: this.headers(),
        responseType: 'text',
        validateStatus: () => true,
      })
    );
  }

  async postForm(url: string, form: Record<string, string>): Promise<string> {
    const target = this.absolute(url);
    return this.send(target, () =>
      axios.post<string>(target, new URLSearchParams(form).toString(), {
        timeout: this.options.timeoutMs,
        headers: { ...this.headers(), 'Content-Type': 'application/x-www-form-urlencoded' },
        responseType: 'text',
        validateStatus: () => true,
      })
    );
  }

  private headers(): Record<string, string> {
    return {
      'User-Agent': this.options.userAgent,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
    };
  }

  private async send(url: string, request: () => Promise<AxiosResponse<string>>): Promise<string> {
    let response: AxiosResponse<string>;
    try {
      response = await request();
    } catch (error) {
      throw new TransientScrapeError(`${this.options.source} request to ${url} failed: ${errorMessage(error)}`, this.options.source);
    }

    const failure = errorForStatus(response.status, this.options.source, url, response.headers?.['retry-after']);
    if (failure) {
      throw failure;
    }
    if (typeof response.data !== 'string') {
      throw new TransientScrapeError(`${this.options.source} returned a non-text body for ${url}`, this.options.source);
    }
    return response.data;
  }
}
