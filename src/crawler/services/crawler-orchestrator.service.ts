import {
  Injectable,
  OnModuleDestroy,
  OnModuleInit,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CrawlMode,
  CrawlRun,
} from '../../common/interfaces/crawl-run.interface';
import {
  CrawlConflictException,
  CrawlValidationException,
} from '../../common/errors/crawl.errors';
import { SnapshotStore } from '../../snapshot/snapshot-store';
import { CrawlSession } from './crawl-session';
import { CrawlerService } from './crawler.service';
import { SiteListService } from './site-list.service';

export type StartCrawlResponse =
  | { status: 'cached'; message: string; run: CrawlRun }
  | {
      status: 'started';
      message: string;
      sessionId: string;
      rootUrl: string;
      pageBudget: number;
    };

export interface StartBatchCrawlResponse {
  status: 'started';
  message: string;
  sessionId: string;
  totalWebsites: number;
}

/**
 * Owns the crawl session and admits at most one running crawl. The start
 * methods return as soon as the crawl is admitted; the run methods resolve
 * with the finished run.
 */
@Injectable()
export class CrawlerOrchestrator implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CrawlerOrchestrator.name);
  private readonly defaultPageBudget: number;
  private session: CrawlSession | null = null;
  private activeCrawl: Promise<CrawlRun> | null = null;

  constructor(
    private readonly crawlerService: CrawlerService,
    private readonly snapshotStore: SnapshotStore,
    private readonly siteListService: SiteListService,
    private readonly configService: ConfigService,
  ) {
    this.defaultPageBudget = this.configService.get<number>(
      'CRAWLER_DEFAULT_MAX_PAGES',
      30,
    );
  }

  onModuleInit() {
    this.logger.log('Crawler Orchestrator initialized');
  }

  async onModuleDestroy() {
    if (this.activeCrawl) {
      this.logger.log('Waiting for the active crawl to finish...');
      await this.activeCrawl;
    }
  }

  /** The running session, or the last one to finish. */
  get currentSession(): CrawlSession | null {
    return this.session;
  }

  async startSiteCrawl(
    rootUrl: string,
    pageBudget: number = this.defaultPageBudget,
  ): Promise<StartCrawlResponse> {
    this.assertIdle();
    this.validateSiteRequest(rootUrl, pageBudget);

    const cached = await this.loadCached(rootUrl);
    if (cached) {
      return { status: 'cached', message: 'Found cached results', run: cached };
    }

    const session = this.admit('site', rootUrl, pageBudget);
    void this.track(session, this.crawlerService.crawlSite(session));

    return {
      status: 'started',
      message: 'Crawl started',
      sessionId: session.id,
      rootUrl,
      pageBudget,
    };
  }

  async startListCrawl(urls?: string[]): Promise<StartBatchCrawlResponse> {
    this.assertIdle();

    const sites =
      urls && urls.length > 0 ? urls : await this.siteListService.readUrls();
    if (sites.length === 0) {
      throw new CrawlValidationException('Site list is empty or not found');
    }

    const session = this.admit('list', sites[0], sites.length);
    void this.track(session, this.crawlerService.crawlList(session, sites));

    return {
      status: 'started',
      message: 'Batch crawl started',
      sessionId: session.id,
      totalWebsites: sites.length,
    };
  }

  /** Runs a site crawl to completion. Does not consult cached snapshots. */
  async runSiteCrawl(rootUrl: string, pageBudget: number): Promise<CrawlRun> {
    this.assertIdle();
    this.validateSiteRequest(rootUrl, pageBudget);

    const session = this.admit('site', rootUrl, pageBudget);
    return this.track(session, this.crawlerService.crawlSite(session));
  }

  async runListCrawl(urls: string[]): Promise<CrawlRun> {
    this.assertIdle();
    if (urls.length === 0) {
      throw new CrawlValidationException('Site list is empty or not found');
    }

    const session = this.admit('list', urls[0], urls.length);
    return this.track(session, this.crawlerService.crawlList(session, urls));
  }

  private assertIdle(): void {
    if (this.session?.isRunning) {
      throw new CrawlConflictException();
    }
  }

  // Must stay synchronous: the idle check and the new session go together
  private admit(mode: CrawlMode, rootUrl: string, pageBudget: number) {
    this.assertIdle();
    const session = new CrawlSession(mode, rootUrl, pageBudget);
    this.session = session;
    this.logger.log(`Admitted ${mode} crawl ${session.id} for ${rootUrl}`);
    return session;
  }

  private track(
    session: CrawlSession,
    crawl: Promise<CrawlRun>,
  ): Promise<CrawlRun> {
    const task = crawl
      .catch((error: unknown) => {
        this.logger.error(`Fatal error in crawl ${session.id}`, error);
        session.finish();
        return session.toRun();
      })
      .finally(() => {
        if (this.activeCrawl === task) {
          this.activeCrawl = null;
        }
      });

    this.activeCrawl = task;
    return task;
  }

  private async loadCached(rootUrl: string): Promise<CrawlRun | null> {
    try {
      return await this.snapshotStore.loadLatest(new URL(rootUrl).origin);
    } catch (error) {
      this.logger.warn(
        `Ignoring unreadable snapshot for ${rootUrl}: ${String(error)}`,
      );
      return null;
    }
  }

  private validateSiteRequest(rootUrl: string, pageBudget: number): void {
    if (!rootUrl || !rootUrl.trim()) {
      throw new CrawlValidationException('Homepage URL is required');
    }

    let parsed: URL;
    try {
      parsed = new URL(rootUrl);
    } catch {
      throw new CrawlValidationException(`Invalid homepage URL: ${rootUrl}`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new CrawlValidationException(
        `Homepage URL must use http or https: ${rootUrl}`,
      );
    }

    if (!Number.isInteger(pageBudget) || pageBudget < 1) {
      throw new CrawlValidationException(
        'Maximum pages must be a positive integer',
      );
    }
  }
}
