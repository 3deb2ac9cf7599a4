import { IsInt, IsOptional, IsUrl, Max, Min } from 'class-validator';

// Single-label hosts such as localhost and underscores in host names are fine
export const ROOT_URL_OPTIONS = {
  protocols: ['http', 'https'],
  require_protocol: true,
  require_tld: false,
  allow_underscores: true,
} satisfies Parameters<typeof IsUrl>[0];

export class StartCrawlDto {
  @IsUrl(ROOT_URL_OPTIONS)
  rootUrl!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(500)
  maxPages?: number;
}
