import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { CommonModule } from '../common/common.module';
import { SnapshotModule } from '../snapshot/snapshot.module';
import { CrawlerController } from './crawler.controller';
import { CrawlerService } from './services/crawler.service';
import { CrawlerOrchestrator } from './services/crawler-orchestrator.service';
import { CrawlStatusService } from './services/crawl-status.service';
import { CsvExportService } from './services/csv-export.service';
import { HttpFetchService } from './services/http-fetch.service';
import { LinkParserService } from './services/link-parser.service';
import { PageFetchService } from './services/page-fetch.service';
import { SiteListService } from './services/site-list.service';

@Module({
  imports: [HttpModule, ConfigModule, CommonModule, SnapshotModule],
  controllers: [CrawlerController],
  providers: [
    CrawlerService,
    CrawlerOrchestrator,
    CrawlStatusService,
    CsvExportService,
    HttpFetchService,
    LinkParserService,
    PageFetchService,
    SiteListService,
  ],
  exports: [CrawlerOrchestrator, CrawlStatusService],
})
export class CrawlerModule {}
