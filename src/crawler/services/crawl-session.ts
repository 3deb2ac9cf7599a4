import { randomUUID } from 'crypto';
import {
  CrawlMode,
  CrawlProgress,
  CrawlRun,
  PageResult,
} from '../../common/interfaces/crawl-run.interface';

export const IDLE_PROGRESS: Readonly<CrawlProgress> = Object.freeze({
  isRunning: false,
  totalPages: 0,
  currentPageIndex: 0,
  percentComplete: 0,
});

/**
 * Progress and accumulated pages of one crawl run. Readers only ever get
 * copies, so a status request never sees a half-updated run.
 */
export class CrawlSession {
  readonly id = randomUUID();
  readonly startedAt = new Date();

  private running = true;
  private totalPages = 0;
  private currentPageIndex = 0;
  private readonly pages: PageResult[] = [];

  constructor(
    readonly mode: CrawlMode,
    readonly rootUrl: string,
    readonly pageBudget: number,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  setTotalPages(totalPages: number, currentPageIndex = 0): void {
    this.totalPages = totalPages;
    this.currentPageIndex = currentPageIndex;
  }

  advance(): void {
    this.currentPageIndex += 1;
  }

  record(page: PageResult): void {
    this.pages.push(page);
  }

  get pageCount(): number {
    return this.pages.length;
  }

  finish(): void {
    this.running = false;
  }

  getProgress(): CrawlProgress {
    return {
      isRunning: this.running,
      totalPages: this.totalPages,
      currentPageIndex: this.currentPageIndex,
      percentComplete: !this.running
        ? 100
        : this.totalPages > 0
          ? (this.currentPageIndex / this.totalPages) * 100
          : 0,
    };
  }

  getPages(): PageResult[] {
    return this.pages.map((page) => ({ ...page }));
  }

  toRun(): CrawlRun {
    return {
      mode: this.mode,
      rootUrl: this.rootUrl,
      startedAt: this.startedAt,
      pageBudget: this.pageBudget,
      pages: this.getPages(),
    };
  }
}
