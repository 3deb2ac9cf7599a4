import { plainToInstance, Type } from 'class-transformer';
import {
  IsArray,
  IsDate,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
  validate,
} from 'class-validator';
import { SnapshotStorageException } from '../../common/errors/crawl.errors';
import {
  CrawlMode,
  CrawlRun,
  PageResult,
  PageStatus,
} from '../../common/interfaces/crawl-run.interface';

export class PageResultDocument {
  @IsString()
  url!: string;

  @IsString()
  title!: string;

  @IsString()
  content!: string;

  @IsInt()
  @Min(0)
  wordCount!: number;

  @Type(() => Date)
  @IsDate()
  timestamp!: Date;

  @IsIn(['success', 'error'])
  status!: PageStatus;

  @IsOptional()
  @IsString()
  rawMarkup?: string;
}

/** On-disk shape of one snapshot. */
export class SnapshotDocument {
  @IsString()
  rootUrl!: string;

  @IsIn(['site', 'list'])
  mode!: CrawlMode;

  @IsInt()
  @Min(1)
  pageBudget!: number;

  @Type(() => Date)
  @IsDate()
  crawlTimestamp!: Date;

  @IsInt()
  @Min(0)
  totalPages!: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PageResultDocument)
  results!: PageResultDocument[];
}

export function toSnapshotDocument(run: CrawlRun): SnapshotDocument {
  return {
    rootUrl: run.rootUrl,
    mode: run.mode,
    pageBudget: run.pageBudget,
    crawlTimestamp: run.startedAt,
    totalPages: run.pages.length,
    results: run.pages.map((page) => ({ ...page })),
  };
}

export function fromSnapshotDocument(document: SnapshotDocument): CrawlRun {
  return {
    mode: document.mode,
    rootUrl: document.rootUrl,
    startedAt: document.crawlTimestamp,
    pageBudget: document.pageBudget,
    pages: document.results.map((result) => {
      const page: PageResult = {
        url: result.url,
        title: result.title,
        content: result.content,
        wordCount: result.wordCount,
        timestamp: result.timestamp,
        status: result.status,
      };
      if (result.rawMarkup !== undefined) {
        page.rawMarkup = result.rawMarkup;
      }
      return page;
    }),
  };
}

export function serializeSnapshot(run: CrawlRun): string {
  return JSON.stringify(toSnapshotDocument(run), null, 2);
}

/**
 * Parses and validates a serialized snapshot.
 *
 * @throws SnapshotStorageException when the text is not a valid snapshot
 */
export async function deserializeSnapshot(
  key: string,
  text: string,
): Promise<CrawlRun> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new SnapshotStorageException(`Snapshot ${key} is not valid JSON`, error);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new SnapshotStorageException(`Snapshot ${key} is not an object`);
  }

  const document = plainToInstance(SnapshotDocument, parsed);
  const errors = await validate(document);
  if (errors.length > 0) {
    throw new SnapshotStorageException(
      `Snapshot ${key} is malformed: ${errors.map((e) => e.property).join(', ')}`,
    );
  }
  return fromSnapshotDocument(document);
}
