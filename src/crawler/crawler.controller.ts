import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  ParseBoolPipe,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { CrawlProgress } from '../common/interfaces/crawl-run.interface';
import { CrawlResultsDto } from './dto/crawl-results.dto';
import { StartBatchCrawlDto } from './dto/start-batch-crawl.dto';
import { StartCrawlDto } from './dto/start-crawl.dto';
import {
  CrawlerOrchestrator,
  StartBatchCrawlResponse,
  StartCrawlResponse,
} from './services/crawler-orchestrator.service';
import { CrawlStatusService } from './services/crawl-status.service';
import { CsvExportService } from './services/csv-export.service';

@Controller('crawl')
export class CrawlerController {
  constructor(
    private readonly crawlerOrchestrator: CrawlerOrchestrator,
    private readonly crawlStatusService: CrawlStatusService,
    private readonly csvExportService: CsvExportService,
  ) {}

  @Post()
  async startCrawl(
    @Body() startCrawlDto: StartCrawlDto,
  ): Promise<StartCrawlResponse> {
    return this.crawlerOrchestrator.startSiteCrawl(
      startCrawlDto.rootUrl,
      startCrawlDto.maxPages,
    );
  }

  @Post('batch')
  async startBatchCrawl(
    @Body() startBatchCrawlDto: StartBatchCrawlDto,
  ): Promise<StartBatchCrawlResponse> {
    return this.crawlerOrchestrator.startListCrawl(startBatchCrawlDto.urls);
  }

  @Get('status')
  getStatus(): CrawlProgress {
    return this.crawlStatusService.getProgress();
  }

  @Get('results')
  getResults(
    @Query('includeMarkup', new DefaultValuePipe(false), ParseBoolPipe)
    includeMarkup: boolean,
  ): CrawlResultsDto {
    return this.crawlStatusService.getAccumulatedResults(includeMarkup);
  }

  @Get('export/csv')
  exportCsv(@Res({ passthrough: true }) res: Response): string {
    const { pages } = this.crawlStatusService.getAccumulatedResults();
    const csv = this.csvExportService.toCsv(pages);

    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader(
      'Content-Disposition',
      `attachment; filename="${this.csvExportService.buildFileName()}"`,
    );
    return csv;
  }
}
