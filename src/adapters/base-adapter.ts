import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { HintSourceError } from '../errors.js';
import type { HintAdapter, HintAdapterConfig, HintPreference, StreamHint, StreamRef } from '../types/adapter.js';
import { parseTimestamp } from '../utils/date.js';

export abstract class BaseAdapter implements HintAdapter {
  abstract readonly config: HintAdapterConfig;
  abstract parseStreamUrl(url: URL): StreamRef | null;
  abstract streamPageUrl(ref: StreamRef): string;
  abstract parse(html: string, ref: StreamRef, preference: HintPreference): StreamHint;

  protected load(html: string): CheerioAPI {
    return cheerio.load(html);
  }

  protected pathSegments(url: URL): string[] {
    return url.pathname.split('/').filter((s) => s.length > 0);
  }

  protected isVideoId(value: string | undefined): value is string {
    return value !== undefined && /^\d{1,20}$/.test(value);
  }

  protected error(message: string): HintSourceError {
    return new HintSourceError(message, this.config.id);
  }

  /** Parses a timestamp scraped from the page, reporting failures against this source. */
  protected timestamp(text: string | undefined, what: string): number {
    if (!text) throw this.error(`${this.config.name}: couldn't find the ${what}`);
    try {
      return parseTimestamp(text);
    } catch {
      throw this.error(`${this.config.name}: couldn't parse the ${what} "${text}"`);
    }
  }
}
