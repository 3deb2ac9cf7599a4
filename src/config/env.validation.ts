import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const SNAPSHOT_DRIVERS = ['file', 'database'] as const;
export type SnapshotDriver = (typeof SNAPSHOT_DRIVERS)[number];

export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsInt()
  @Min(0)
  @Max(65535)
  PORT: number = 8080;

  @IsString()
  DATABASE_PATH: string = 'data/site-crawler.db';

  @IsInt()
  @Min(1)
  HTTP_TIMEOUT_MS: number = 10000;

  @IsInt()
  @Min(1)
  CRAWLER_CONCURRENCY: number = 1;

  @IsInt()
  @Min(1)
  CRAWLER_DEFAULT_MAX_PAGES: number = 30;

  @IsInt()
  @Min(0)
  CRAWLER_WORD_COUNT_THRESHOLD: number = 50;

  @IsInt()
  @Min(0)
  PAGE_CACHE_MAX_ENTRIES: number = 500;

  @IsIn(SNAPSHOT_DRIVERS)
  SNAPSHOT_DRIVER: SnapshotDriver = 'file';

  @IsString()
  SNAPSHOT_DIR: string = 'cache';

  @IsString()
  SITE_LIST_PATH: string = 'list_of_website.txt';
}

export function validateEnv(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(errors.map((error) => error.toString()).join('\n'));
  }
  return validated;
}
