import {
  Entity,
  PrimaryColumn,
  Column,
  Index,
  UpdateDateColumn,
} from 'typeorm';
import { CrawlMode } from '../../common/interfaces/crawl-run.interface';

@Entity('snapshots')
export class SnapshotEntity {
  @PrimaryColumn()
  key!: string;

  @Index()
  @Column()
  origin!: string;

  @Column({ type: 'varchar' })
  mode!: CrawlMode;

  @Column()
  rootUrl!: string;

  @Column()
  pageBudget!: number;

  @Column()
  totalPages!: number;

  @Column({ type: 'blob' })
  compressedContent!: Buffer;

  @Column()
  contentHash!: string;

  @Column()
  originalSize!: number;

  @Column()
  compressedSize!: number;

  @Column({ type: 'datetime' })
  createdAt!: Date;

  @UpdateDateColumn()
  modifiedAt!: Date;
}
