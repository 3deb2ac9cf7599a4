import { Injectable } from '@nestjs/common';
import { CrawlProgress } from '../../common/interfaces/crawl-run.interface';
import { CrawlResultsDto } from '../dto/crawl-results.dto';
import { IDLE_PROGRESS } from './crawl-session';
import { CrawlerOrchestrator } from './crawler-orchestrator.service';

/** Read-only view of the current (or last) crawl session. */
@Injectable()
export class CrawlStatusService {
  constructor(private readonly crawlerOrchestrator: CrawlerOrchestrator) {}

  getProgress(): CrawlProgress {
    const session = this.crawlerOrchestrator.currentSession;
    return session ? session.getProgress() : { ...IDLE_PROGRESS };
  }

  getAccumulatedResults(includeMarkup = false): CrawlResultsDto {
    const pages = this.crawlerOrchestrator.currentSession?.getPages() ?? [];
    const successCount = pages.filter((page) => page.status === 'success').length;

    return {
      pages: includeMarkup
        ? pages
        : pages.map(({ rawMarkup: _rawMarkup, ...page }) => page),
      totalCount: pages.length,
      successCount,
      errorCount: pages.length - successCount,
    };
  }
}
