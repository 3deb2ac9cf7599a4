import { CrawlRun } from '../common/interfaces/crawl-run.interface';

export interface SnapshotMetadata {
  key: string;
  origin: string;
  size: number;
  createdAt: Date;
  modifiedAt: Date;
}

/**
 * Persistence seam for finished crawl runs. Every save creates a new
 * snapshot; nothing is overwritten.
 */
export abstract class SnapshotStore {
  /** Stores the run and returns the key of the new snapshot. */
  abstract save(origin: string, run: CrawlRun): Promise<string>;

  /** Most recent snapshot for the origin, or `null` when there is none. */
  abstract loadLatest(origin: string): Promise<CrawlRun | null>;

  /** All snapshots, newest first. */
  abstract list(): Promise<SnapshotMetadata[]>;

  /** @throws SnapshotNotFoundException when the key does not exist */
  abstract loadByKey(key: string): Promise<CrawlRun>;

  /** Removes every snapshot and returns how many were removed. */
  abstract clear(): Promise<number>;
}
