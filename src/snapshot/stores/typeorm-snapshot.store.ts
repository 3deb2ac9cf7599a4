import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CrawlRun } from '../../common/interfaces/crawl-run.interface';
import { ContentCodecService } from '../../common/services/content-codec.service';
import {
  SnapshotNotFoundException,
  SnapshotStorageException,
} from '../../common/errors/crawl.errors';
import {
  deserializeSnapshot,
  serializeSnapshot,
} from '../dto/snapshot-document.dto';
import { SnapshotEntity } from '../entities/snapshot.entity';
import { SnapshotMetadata, SnapshotStore } from '../snapshot-store';
import {
  buildSnapshotKey,
  compareKeysByRecency,
  toOriginSlug,
} from '../snapshot-key';

const MAX_SEQUENCE = 999;

/** Snapshots as compressed rows of the `snapshots` table. */
@Injectable()
export class TypeOrmSnapshotStore extends SnapshotStore {
  private readonly logger = new Logger(TypeOrmSnapshotStore.name);

  constructor(
    @InjectRepository(SnapshotEntity)
    private readonly snapshotRepo: Repository<SnapshotEntity>,
    private readonly codecService: ContentCodecService,
  ) {
    super();
  }

  async save(origin: string, run: CrawlRun): Promise<string> {
    const encoded = await this.codecService.encode(serializeSnapshot(run));
    const createdAt = new Date();

    try {
      const key = await this.nextFreeKey(origin, createdAt);
      const snapshot = this.snapshotRepo.create({
        key,
        origin: toOriginSlug(origin),
        mode: run.mode,
        rootUrl: run.rootUrl,
        pageBudget: run.pageBudget,
        totalPages: run.pages.length,
        compressedContent: encoded.payload,
        contentHash: encoded.contentHash,
        originalSize: encoded.originalSize,
        compressedSize: encoded.compressedSize,
        createdAt,
      });
      await this.snapshotRepo.insert(snapshot);
      this.logger.log(`Saved snapshot ${key}`);
      return key;
    } catch (error) {
      if (error instanceof SnapshotStorageException) {
        throw error;
      }
      throw new SnapshotStorageException(
        `Failed to save snapshot for ${origin}`,
        error,
      );
    }
  }

  async loadLatest(origin: string): Promise<CrawlRun | null> {
    const candidates = await this.snapshotRepo.find({
      select: { key: true },
      where: { origin: toOriginSlug(origin) },
    });
    if (candidates.length === 0) {
      return null;
    }

    const [latest] = candidates
      .map((candidate) => candidate.key)
      .sort(compareKeysByRecency);
    return this.loadByKey(latest);
  }

  async list(): Promise<SnapshotMetadata[]> {
    const rows = await this.snapshotRepo.find({
      select: {
        key: true,
        origin: true,
        originalSize: true,
        createdAt: true,
        modifiedAt: true,
      },
    });

    return rows
      .sort((a, b) => compareKeysByRecency(a.key, b.key))
      .map((row) => ({
        key: row.key,
        origin: row.origin,
        size: row.originalSize,
        createdAt: row.createdAt,
        modifiedAt: row.modifiedAt,
      }));
  }

  async loadByKey(key: string): Promise<CrawlRun> {
    const snapshot = await this.snapshotRepo.findOne({ where: { key } });
    if (!snapshot) {
      throw new SnapshotNotFoundException(key);
    }

    let text: string;
    try {
      text = await this.codecService.decode(
        snapshot.compressedContent,
        snapshot.contentHash,
      );
    } catch (error) {
      throw new SnapshotStorageException(`Failed to decode snapshot ${key}`, error);
    }
    return deserializeSnapshot(key, text);
  }

  async clear(): Promise<number> {
    const count = await this.snapshotRepo.count();
    if (count > 0) {
      await this.snapshotRepo.clear();
      this.logger.log(`Cleared ${count} snapshots`);
    }
    return count;
  }

  private async nextFreeKey(origin: string, createdAt: Date): Promise<string> {
    for (let sequence = 0; sequence <= MAX_SEQUENCE; sequence++) {
      const key = buildSnapshotKey(origin, createdAt, sequence);
      if ((await this.snapshotRepo.count({ where: { key } })) === 0) {
        return key;
      }
    }
    throw new SnapshotStorageException(
      `No free snapshot key left for ${origin}`,
    );
  }
}
