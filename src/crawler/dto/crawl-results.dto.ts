import { PageResult } from '../../common/interfaces/crawl-run.interface';

export interface CrawlResultsDto {
  pages: PageResult[];
  totalCount: number;
  successCount: number;
  errorCount: number;
}
