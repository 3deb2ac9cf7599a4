import { Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { CrawlRun } from '../common/interfaces/crawl-run.interface';
import { SnapshotMetadata, SnapshotStore } from './snapshot-store';

@Controller('snapshots')
export class SnapshotController {
  constructor(private readonly snapshotStore: SnapshotStore) {}

  @Get()
  async listSnapshots(): Promise<{ snapshots: SnapshotMetadata[] }> {
    return { snapshots: await this.snapshotStore.list() };
  }

  @Get(':key')
  async loadSnapshot(@Param('key') key: string): Promise<CrawlRun> {
    return this.snapshotStore.loadByKey(key);
  }

  @Post('clear')
  @HttpCode(200)
  async clearSnapshots(): Promise<{ message: string; cleared: number }> {
    const cleared = await this.snapshotStore.clear();
    return { message: 'Snapshots cleared', cleared };
  }
}
