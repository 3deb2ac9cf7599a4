export type CacheMode = 'enabled' | 'bypass';

export interface ContentFilterConfig {
  /** Minimum text density (share of a block's text outside links). */
  threshold: number;
  /** `dynamic` relaxes the filter for headings. */
  thresholdType: 'fixed' | 'dynamic';
  minWordThreshold: number;
}

export interface PageFetchConfig {
  cacheMode: CacheMode;
  excludedTags: string[];
  /** Paragraph-like blocks with fewer words are dropped from the content. */
  wordCountThreshold: number;
  contentFilter?: ContentFilterConfig;
}

export interface FetchedPage {
  title: string;
  extractedContent: string;
  filteredContent?: string;
  rawMarkup: string;
}

export type PageFetchOutcome =
  | { ok: true; page: FetchedPage }
  | { ok: false; reason: string };
