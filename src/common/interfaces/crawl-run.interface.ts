export type PageStatus = 'success' | 'error';

export type CrawlMode = 'site' | 'list';

export interface PageResult {
  url: string;
  title: string;
  content: string;
  wordCount: number;
  timestamp: Date;
  status: PageStatus;
  rawMarkup?: string;
}

export interface CrawlRun {
  mode: CrawlMode;
  rootUrl: string;
  startedAt: Date;
  pageBudget: number;
  pages: PageResult[];
}

export interface CrawlProgress {
  isRunning: boolean;
  totalPages: number;
  currentPageIndex: number;
  percentComplete: number;
}
