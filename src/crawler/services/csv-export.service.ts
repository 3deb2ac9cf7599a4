import { Injectable } from '@nestjs/common';
import { PageResult } from '../../common/interfaces/crawl-run.interface';
import { CrawlValidationException } from '../../common/errors/crawl.errors';
import { ContentNormalizerService } from '../../common/services/content-normalizer.service';

const COLUMNS = ['URL', 'Title', 'Content', 'Word Count', 'Status', 'Timestamp'];

export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

@Injectable()
export class CsvExportService {
  constructor(private readonly normalizer: ContentNormalizerService) {}

  toCsv(pages: PageResult[]): string {
    if (pages.length === 0) {
      throw new CrawlValidationException('No results to download');
    }

    const rows = pages.map((page) => [
      page.url,
      page.title,
      this.normalizer.normalize(page.content),
      String(page.wordCount),
      page.status,
      page.timestamp.toISOString(),
    ]);

    return (
      [COLUMNS, ...rows]
        .map((row) => row.map(escapeCsvField).join(','))
        .join('\n') + '\n'
    );
  }

  /** `crawl_results_20261019_101500.csv` */
  buildFileName(now: Date = new Date()): string {
    const stamp = now
      .toISOString()
      .slice(0, 19)
      .replace(/[-:]/g, '')
      .replace('T', '_');
    return `crawl_results_${stamp}.csv`;
  }
}
