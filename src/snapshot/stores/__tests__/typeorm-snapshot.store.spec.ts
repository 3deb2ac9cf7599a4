import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken, TypeOrmModule } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TypeOrmSnapshotStore } from '../typeorm-snapshot.store';
import { SnapshotEntity } from '../../entities/snapshot.entity';
import { ContentCodecService } from '../../../common/services/content-codec.service';
import { CrawlRun } from '../../../common/interfaces/crawl-run.interface';
import {
  SnapshotNotFoundException,
  SnapshotStorageException,
} from '../../../common/errors/crawl.errors';

const buildRun = (rootUrl: string, title = 'Home'): CrawlRun => ({
  mode: 'site',
  rootUrl,
  startedAt: new Date('2026-10-19T10:14:00.000Z'),
  pageBudget: 5,
  pages: [
    {
      url: rootUrl,
      title,
      content: 'Hello world',
      wordCount: 2,
      timestamp: new Date('2026-10-19T10:14:01.000Z'),
      status: 'success',
      rawMarkup: '<p>Hello world</p>',
    },
    {
      url: `${rootUrl}/broken`,
      title: 'Critical Error',
      content: 'Exception: socket hang up',
      wordCount: 0,
      timestamp: new Date('2026-10-19T10:14:02.000Z'),
      status: 'error',
    },
  ],
});

describe('TypeOrmSnapshotStore', () => {
  let module: TestingModule;
  let store: TypeOrmSnapshotStore;
  let snapshotRepo: Repository<SnapshotEntity>;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'sqlite',
          database: ':memory:',
          entities: [SnapshotEntity],
          synchronize: true,
        }),
        TypeOrmModule.forFeature([SnapshotEntity]),
      ],
      providers: [TypeOrmSnapshotStore, ContentCodecService],
    }).compile();

    store = module.get<TypeOrmSnapshotStore>(TypeOrmSnapshotStore);
    snapshotRepo = module.get<Repository<SnapshotEntity>>(
      getRepositoryToken(SnapshotEntity),
    );

    jest.useFakeTimers({
      now: new Date('2026-10-19T10:15:00.000Z'),
      doNotFake: [
        'hrtime',
        'nextTick',
        'performance',
        'queueMicrotask',
        'setImmediate',
        'clearImmediate',
        'setInterval',
        'clearInterval',
        'setTimeout',
        'clearTimeout',
      ],
    });
  });

  afterEach(async () => {
    jest.useRealTimers();
    await module.close();
  });

  it('should save a run and load it back', async () => {
    const run = buildRun('https://example.com');

    const key = await store.save('https://example.com', run);

    expect(key).toBe('https_example.com__20261019T101500000Z');
    await expect(store.loadLatest('https://example.com')).resolves.toEqual(run);
  });

  it('should store the run compressed with its hash', async () => {
    const key = await store.save(
      'https://example.com',
      buildRun('https://example.com'),
    );

    const row = await snapshotRepo.findOneBy({ key });

    expect(row).toEqual(
      expect.objectContaining({
        origin: 'https_example.com',
        mode: 'site',
        rootUrl: 'https://example.com',
        pageBudget: 5,
        totalPages: 2,
        createdAt: new Date('2026-10-19T10:15:00.000Z'),
      }),
    );
    expect(row?.contentHash).toMatch(/^[0-9a-f]{64}$/);
    expect(row?.compressedSize).toBe(row?.compressedContent.length);
    expect(row?.originalSize).toBeGreaterThan(row?.compressedSize ?? 0);
  });

  it('should never overwrite a snapshot saved in the same millisecond', async () => {
    const first = await store.save(
      'https://example.com',
      buildRun('https://example.com', 'First'),
    );
    const second = await store.save(
      'https://example.com',
      buildRun('https://example.com', 'Second'),
    );

    expect(second).toBe(`${first}-001`);
    expect((await store.loadByKey(first)).pages[0].title).toBe('First');
    expect(
      (await store.loadLatest('https://example.com'))?.pages[0].title,
    ).toBe('Second');
  });

  it('should load the most recent snapshot of the origin', async () => {
    await store.save('https://example.com', buildRun('https://example.com', 'Old'));
    jest.setSystemTime(new Date('2026-10-19T12:00:00.000Z'));
    await store.save('https://example.com', buildRun('https://example.com', 'New'));
    await store.save('https://other.com', buildRun('https://other.com'));

    const latest = await store.loadLatest('https://example.com');

    expect(latest?.pages[0].title).toBe('New');
    await expect(store.loadLatest('https://missing.com')).resolves.toBeNull();
  });

  it('should list snapshots newest first', async () => {
    await store.save('https://example.com', buildRun('https://example.com'));
    jest.setSystemTime(new Date('2026-10-19T10:16:00.000Z'));
    await store.save('site-list', buildRun('https://one.com'));

    const snapshots = await store.list();

    expect(snapshots.map((snapshot) => snapshot.key)).toEqual([
      'site-list__20261019T101600000Z',
      'https_example.com__20261019T101500000Z',
    ]);
    const row = await snapshotRepo.findOneBy({
      key: 'site-list__20261019T101600000Z',
    });
    expect(snapshots[0]).toEqual(
      expect.objectContaining({
        origin: 'site-list',
        size: row?.originalSize,
        createdAt: new Date('2026-10-19T10:16:00.000Z'),
      }),
    );
  });

  it('should report an unknown key as not found', async () => {
    await expect(
      store.loadByKey('https_example.com__20261019T101500000Z'),
    ).rejects.toThrow(SnapshotNotFoundException);
  });

  it('should refuse content that does not match its hash', async () => {
    const key = await store.save(
      'https://example.com',
      buildRun('https://example.com'),
    );
    await snapshotRepo.update({ key }, { contentHash: 'f'.repeat(64) });

    await expect(store.loadByKey(key)).rejects.toThrow(
      new SnapshotStorageException(`Failed to decode snapshot ${key}`),
    );
  });

  it('should clear every snapshot', async () => {
    await store.save('https://example.com', buildRun('https://example.com'));
    await store.save('https://other.com', buildRun('https://other.com'));

    await expect(store.clear()).resolves.toBe(2);
    await expect(store.list()).resolves.toEqual([]);
    await expect(store.clear()).resolves.toBe(0);
  });
});
