import { Injectable, Logger } from '@nestjs/common';
import * as cheerio from 'cheerio';

const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

function originOf(url: string): string | null {
  try {
    return new URL(url).origin;
  } catch {
    return null;
  }
}

@Injectable()
export class LinkParserService {
  private readonly logger = new Logger(LinkParserService.name);

  /**
   * Same-origin links of the page in first-seen order, without duplicates.
   * Root-relative hrefs are resolved against `baseUrl`, absolute ones are
   * kept as written, and anything else is skipped.
   */
  extractLinks(html: string, baseUrl: string, limit?: number): string[] {
    if (!html || (limit !== undefined && limit <= 0)) {
      return [];
    }

    const baseOrigin = originOf(baseUrl);
    if (!baseOrigin || baseOrigin === 'null') {
      return [];
    }

    const links = new Set<string>();
    try {
      const $ = cheerio.load(html);

      $('a[href]').each((_, element) => {
        if (limit !== undefined && links.size >= limit) {
          return false;
        }

        const href = ($(element).attr('href') ?? '').trim();
        let candidate: string;
        if (href.startsWith('/')) {
          try {
            candidate = new URL(href, baseUrl).toString();
          } catch {
            return;
          }
        } else if (SCHEME.test(href)) {
          candidate = href;
        } else {
          return;
        }

        if (originOf(candidate) === baseOrigin) {
          links.add(candidate);
        }
      });
    } catch (error) {
      this.logger.warn(`Failed to parse links from ${baseUrl}: ${String(error)}`);
      return [];
    }

    return Array.from(links);
  }
}
