import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as cheerio from 'cheerio';
import TurndownService from 'turndown';
import { FetchResult, HttpFetchService } from './http-fetch.service';
import {
  ContentFilterConfig,
  FetchedPage,
  PageFetchConfig,
  PageFetchOutcome,
} from '../interfaces/page-fetch.interface';

const STRIPPED_TAGS = ['script', 'style', 'noscript', 'template'];
const PARAGRAPH_BLOCKS = 'p, li, blockquote, td';
const FILTER_BLOCKS = 'p, li, blockquote, pre, td, h1, h2, h3, h4, h5, h6';
const HEADING = /^h[1-6]$/i;
export const NO_TITLE = 'No Title';

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Fetches a page over HTTP and turns its markup into markdown content.
 * Never throws: every problem is reported as `{ ok: false, reason }`.
 */
@Injectable()
export class PageFetchService {
  private readonly logger = new Logger(PageFetchService.name);
  private readonly cache = new Map<string, FetchedPage>();
  private readonly maxCacheEntries: number;
  private readonly turndown: TurndownService;

  constructor(
    private readonly httpFetchService: HttpFetchService,
    private readonly configService: ConfigService,
  ) {
    this.maxCacheEntries = this.configService.get<number>(
      'PAGE_CACHE_MAX_ENTRIES',
      500,
    );
    this.turndown = new TurndownService({
      headingStyle: 'atx',
      codeBlockStyle: 'fenced',
      bulletListMarker: '-',
      emDelimiter: '*',
      strongDelimiter: '**',
      linkStyle: 'inlined',
    });
  }

  async fetch(url: string, config: PageFetchConfig): Promise<PageFetchOutcome> {
    const cacheKey = this.cacheKey(url, config);
    if (config.cacheMode === 'enabled') {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.logger.debug(`Cache hit for ${url}`);
        return { ok: true, page: cached };
      }
    }

    let result: FetchResult;
    try {
      result = await this.httpFetchService.fetch(url);
    } catch (error) {
      return {
        ok: false,
        reason: error instanceof Error ? error.message : String(error),
      };
    }

    if (result.statusCode >= 400) {
      return { ok: false, reason: `HTTP ${result.statusCode}` };
    }
    if (!result.isHtml) {
      return {
        ok: false,
        reason: `Unsupported content type: ${result.contentType || 'unknown'}`,
      };
    }

    let page: FetchedPage;
    try {
      page = this.extract(result.body, config);
    } catch (error) {
      this.logger.error(`Failed to extract content from ${url}`, error);
      return {
        ok: false,
        reason: `Failed to extract content: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    if (config.cacheMode === 'enabled') {
      this.remember(cacheKey, page);
    }
    return { ok: true, page };
  }

  extract(html: string, config: PageFetchConfig): FetchedPage {
    const $ = cheerio.load(html);
    const title = $('title').first().text().trim() || NO_TITLE;

    $([...STRIPPED_TAGS, ...config.excludedTags].join(', ')).remove();

    // The filter sees every block; the word threshold only shapes the raw content
    const filteredContent = config.contentFilter
      ? this.applyContentFilter($, config.contentFilter)
      : undefined;

    $(PARAGRAPH_BLOCKS).each((_, element) => {
      const block = $(element);
      if (countWords(block.text()) < config.wordCountThreshold) {
        block.remove();
      }
    });

    const page: FetchedPage = {
      title,
      extractedContent: this.toMarkdown($('body').html() ?? ''),
      rawMarkup: html,
    };
    if (filteredContent !== undefined) {
      page.filteredContent = filteredContent;
    }
    return page;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private applyContentFilter(
    $: cheerio.CheerioAPI,
    filter: ContentFilterConfig,
  ): string {
    const kept: string[] = [];

    $(FILTER_BLOCKS).each((_, element) => {
      const block = $(element);
      if (block.parents(FILTER_BLOCKS).length > 0) {
        return;
      }

      const text = block.text();
      const words = countWords(text);
      if (words === 0) {
        return;
      }

      const textChars = text.replace(/\s+/g, '').length;
      const linkChars = block.find('a').text().replace(/\s+/g, '').length;
      const density = 1 - linkChars / textChars;

      const relaxed =
        filter.thresholdType === 'dynamic' && HEADING.test(element.tagName);
      const threshold = relaxed ? filter.threshold / 2 : filter.threshold;
      const minWords = relaxed ? 1 : filter.minWordThreshold;

      if (words >= minWords && density >= threshold) {
        kept.push($.html(element));
      }
    });

    return this.toMarkdown(kept.join('\n'));
  }

  private toMarkdown(html: string): string {
    if (!html.trim()) {
      return '';
    }
    return this.turndown.turndown(html).trim();
  }

  // Extraction settings shape the page, so they are part of the key
  private cacheKey(url: string, config: PageFetchConfig): string {
    const { cacheMode: _cacheMode, ...extraction } = config;
    return `${url}\u0000${JSON.stringify(extraction)}`;
  }

  private remember(key: string, page: FetchedPage): void {
    if (this.maxCacheEntries === 0) {
      return;
    }
    if (this.cache.size >= this.maxCacheEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(key, page);
  }
}
