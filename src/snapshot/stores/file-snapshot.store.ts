import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { CrawlRun } from '../../common/interfaces/crawl-run.interface';
import {
  SnapshotNotFoundException,
  SnapshotStorageException,
} from '../../common/errors/crawl.errors';
import { hasErrorCode } from '../../common/utils/fs-errors';
import {
  deserializeSnapshot,
  serializeSnapshot,
} from '../dto/snapshot-document.dto';
import { SnapshotMetadata, SnapshotStore } from '../snapshot-store';
import {
  buildSnapshotKey,
  compareKeysByRecency,
  parseSnapshotKey,
  toOriginSlug,
} from '../snapshot-key';

const EXTENSION = '.json';
const MAX_SEQUENCE = 999;

/** One pretty-printed JSON file per snapshot, named `<key>.json`. */
@Injectable()
export class FileSnapshotStore extends SnapshotStore {
  private readonly logger = new Logger(FileSnapshotStore.name);
  private readonly directory: string;

  constructor(private readonly configService: ConfigService) {
    super();
    this.directory = path.resolve(
      this.configService.get<string>('SNAPSHOT_DIR', 'cache'),
    );
  }

  async save(origin: string, run: CrawlRun): Promise<string> {
    const body = serializeSnapshot(run);
    const createdAt = new Date();

    try {
      await fs.mkdir(this.directory, { recursive: true });

      for (let sequence = 0; sequence <= MAX_SEQUENCE; sequence++) {
        const key = buildSnapshotKey(origin, createdAt, sequence);
        try {
          // 'wx' refuses to replace an existing snapshot
          await fs.writeFile(this.filePath(key), body, {
            encoding: 'utf-8',
            flag: 'wx',
          });
          this.logger.log(`Saved snapshot ${key}`);
          return key;
        } catch (error) {
          if (!hasErrorCode(error, 'EEXIST')) {
            throw error;
          }
        }
      }
    } catch (error) {
      throw new SnapshotStorageException(
        `Failed to save snapshot for ${origin}`,
        error,
      );
    }

    throw new SnapshotStorageException(
      `No free snapshot key left for ${origin}`,
    );
  }

  async loadLatest(origin: string): Promise<CrawlRun | null> {
    const slug = toOriginSlug(origin);
    const latest = (await this.listKeys()).find(
      (key) => parseSnapshotKey(key)?.originSlug === slug,
    );
    if (!latest) {
      return null;
    }
    return this.loadByKey(latest);
  }

  async list(): Promise<SnapshotMetadata[]> {
    const snapshots: SnapshotMetadata[] = [];

    for (const key of await this.listKeys()) {
      const parsed = parseSnapshotKey(key);
      if (!parsed) {
        continue;
      }
      try {
        const stats = await fs.stat(this.filePath(key));
        snapshots.push({
          key,
          origin: parsed.originSlug,
          size: stats.size,
          createdAt: parsed.createdAt,
          modifiedAt: stats.mtime,
        });
      } catch (error) {
        // Removed between readdir and stat
        this.logger.warn(`Skipping snapshot ${key}: ${String(error)}`);
      }
    }

    return snapshots;
  }

  async loadByKey(key: string): Promise<CrawlRun> {
    const normalizedKey = key.endsWith(EXTENSION)
      ? key.slice(0, -EXTENSION.length)
      : key;
    if (!parseSnapshotKey(normalizedKey)) {
      throw new SnapshotNotFoundException(key);
    }

    let text: string;
    try {
      text = await fs.readFile(this.filePath(normalizedKey), 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new SnapshotNotFoundException(key);
      }
      throw new SnapshotStorageException(`Failed to read snapshot ${key}`, error);
    }

    return deserializeSnapshot(normalizedKey, text);
  }

  async clear(): Promise<number> {
    const keys = await this.listKeys();
    for (const key of keys) {
      await fs.rm(this.filePath(key), { force: true });
    }
    if (keys.length > 0) {
      this.logger.log(`Cleared ${keys.length} snapshots`);
    }
    return keys.length;
  }

  /** Keys of the snapshot files present, newest first. */
  private async listKeys(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw new SnapshotStorageException(
        `Failed to list snapshots in ${this.directory}`,
        error,
      );
    }

    return entries
      .filter((entry) => entry.endsWith(EXTENSION))
      .map((entry) => entry.slice(0, -EXTENSION.length))
      .filter((key) => parseSnapshotKey(key) !== null)
      .sort(compareKeysByRecency);
  }

  private filePath(key: string): string {
    return path.join(this.directory, `${key}${EXTENSION}`);
  }
}
