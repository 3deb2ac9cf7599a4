import { ArrayMinSize, IsArray, IsOptional, IsUrl } from 'class-validator';
import { ROOT_URL_OPTIONS } from './start-crawl.dto';

/** Without `urls` the batch comes from the configured site-list file. */
export class StartBatchCrawlDto {
  @IsOptional()
  @IsArray()
  @ArrayMinSize(1)
  @IsUrl(ROOT_URL_OPTIONS, { each: true })
  urls?: string[];
}
