import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pLimit from 'p-limit';
import {
  CrawlRun,
  PageResult,
} from '../../common/interfaces/crawl-run.interface';
import { SnapshotStore } from '../../snapshot/snapshot-store';
import { SITE_LIST_ORIGIN } from '../../snapshot/snapshot-key';
import {
  PageFetchConfig,
  PageFetchOutcome,
} from '../interfaces/page-fetch.interface';
import { CrawlSession } from './crawl-session';
import { LinkParserService } from './link-parser.service';
import { countWords, PageFetchService } from './page-fetch.service';

const EXCLUDED_TAGS = ['nav', 'footer', 'header', 'aside'];

interface FetchedPageResult {
  result: PageResult;
  markup?: string;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class CrawlerService {
  private readonly logger = new Logger(CrawlerService.name);
  private readonly concurrency: number;
  private readonly wordCountThreshold: number;
  // Shared by every run; only one run is admitted at a time anyway
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(
    private readonly configService: ConfigService,
    private readonly pageFetchService: PageFetchService,
    private readonly linkParserService: LinkParserService,
    private readonly snapshotStore: SnapshotStore,
  ) {
    this.concurrency = this.configService.get<number>('CRAWLER_CONCURRENCY', 1);
    this.wordCountThreshold = this.configService.get<number>(
      'CRAWLER_WORD_COUNT_THRESHOLD',
      50,
    );
    this.limit = pLimit(this.concurrency);
  }

  get siteFetchConfig(): PageFetchConfig {
    return {
      cacheMode: 'enabled',
      excludedTags: EXCLUDED_TAGS,
      wordCountThreshold: this.wordCountThreshold,
      contentFilter: {
        threshold: 0.45,
        thresholdType: 'dynamic',
        minWordThreshold: 10,
      },
    };
  }

  get listFetchConfig(): PageFetchConfig {
    return {
      cacheMode: 'enabled',
      excludedTags: EXCLUDED_TAGS,
      wordCountThreshold: this.wordCountThreshold,
    };
  }

  /** Homepage plus its same-origin links, at most `pageBudget` pages in all. */
  async crawlSite(session: CrawlSession): Promise<CrawlRun> {
    const { rootUrl, pageBudget } = session;
    const config = this.siteFetchConfig;

    try {
      this.logger.log(`Crawling homepage ${rootUrl}`);
      const homepage = await this.fetchPage(rootUrl, config);
      session.record(homepage.result);

      const links =
        homepage.markup !== undefined
          ? this.linkParserService.extractLinks(
              homepage.markup,
              rootUrl,
              pageBudget - 1,
            )
          : [];
      session.setTotalPages(links.length + 1, 1);

      await this.fetchInOrder(session, links, config);
      await this.persist(new URL(rootUrl).origin, session);

      this.logger.log(
        `Two-level crawl of ${rootUrl} completed. Processed ${session.pageCount} pages.`,
      );
    } catch (error) {
      this.logger.error(`Crawl of ${rootUrl} failed`, error);
      if (session.pageCount === 0) {
        session.record(
          this.errorResult(
            rootUrl,
            'Crawl Error',
            `Main crawl failed: ${describeError(error)}`,
          ),
        );
      }
    } finally {
      session.finish();
    }

    return session.toRun();
  }

  async crawlList(session: CrawlSession, urls: string[]): Promise<CrawlRun> {
    try {
      session.setTotalPages(urls.length);
      await this.fetchInOrder(session, urls, this.listFetchConfig);
      await this.persist(SITE_LIST_ORIGIN, session);

      this.logger.log(`Batch crawl completed. Processed ${session.pageCount} sites.`);
    } catch (error) {
      this.logger.error('Batch crawl failed', error);
      if (session.pageCount === 0) {
        session.record(
          this.errorResult(
            session.rootUrl,
            'Crawl Error',
            `Main crawl failed: ${describeError(error)}`,
          ),
        );
      }
    } finally {
      session.finish();
    }

    return session.toRun();
  }

  /**
   * Fetches through the shared limiter and records results in the order the
   * fetches were started, whatever order they finish in.
   */
  private async fetchInOrder(
    session: CrawlSession,
    urls: string[],
    config: PageFetchConfig,
  ): Promise<void> {
    const settled = new Map<number, PageResult>();
    let nextToRecord = 0;

    const flush = () => {
      for (
        let result = settled.get(nextToRecord);
        result !== undefined;
        result = settled.get(nextToRecord)
      ) {
        session.record(result);
        settled.delete(nextToRecord);
        nextToRecord += 1;
      }
    };

    await Promise.all(
      urls.map((url, index) =>
        this.limit(async () => {
          session.advance();
          this.logger.log(`Crawling page ${index + 1}/${urls.length}: ${url}`);
          const { result } = await this.fetchPage(url, config);
          settled.set(index, result);
          flush();
        }),
      ),
    );
  }

  /** The one place a page outcome is turned into a result; never throws. */
  private async fetchPage(
    url: string,
    config: PageFetchConfig,
  ): Promise<FetchedPageResult> {
    let outcome: PageFetchOutcome;
    try {
      outcome = await this.pageFetchService.fetch(url, config);
    } catch (error) {
      this.logger.error(`Critical error crawling ${url}`, error);
      return {
        result: this.errorResult(
          url,
          'Critical Error',
          `Exception: ${describeError(error)}`,
        ),
      };
    }

    if (!outcome.ok) {
      this.logger.warn(`Failed to crawl ${url}: ${outcome.reason}`);
      return {
        result: this.errorResult(url, 'Error', `Failed to crawl: ${outcome.reason}`),
      };
    }

    const { page } = outcome;
    const content = page.filteredContent || page.extractedContent;
    return {
      result: {
        url,
        title: page.title,
        content,
        wordCount: countWords(content),
        timestamp: new Date(),
        status: 'success',
        rawMarkup: page.rawMarkup,
      },
      markup: page.rawMarkup,
    };
  }

  private async persist(origin: string, session: CrawlSession): Promise<void> {
    try {
      await this.snapshotStore.save(origin, session.toRun());
    } catch (error) {
      // The run stays readable through the status endpoints
      this.logger.error(`Failed to persist crawl of ${session.rootUrl}`, error);
    }
  }

  private errorResult(url: string, title: string, content: string): PageResult {
    return {
      url,
      title,
      content,
      wordCount: 0,
      timestamp: new Date(),
      status: 'error',
    };
  }
}
