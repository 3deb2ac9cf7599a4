import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';

export interface FetchResult {
  statusCode: number;
  contentType: string;
  isHtml: boolean;
  body: string;
  durationMs: number;
  finalUrl: string;
}

@Injectable()
export class HttpFetchService {
  private readonly logger = new Logger(HttpFetchService.name);
  private readonly timeout: number;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.timeout = this.configService.get<number>('HTTP_TIMEOUT_MS', 10000);
  }

  async fetch(url: string): Promise<FetchResult> {
    const start = Date.now();
    try {
      const response = await firstValueFrom(
        this.httpService.get<string>(url, {
          timeout: this.timeout,
          maxRedirects: 4,
          responseType: 'text',
          validateStatus: () => true,
          headers: {
            'User-Agent': 'Mozilla/5.0 (compatible; site-crawler/1.0)',
          },
        }),
      );

      const durationMs = Date.now() - start;

      const headers: Record<string, unknown> = { ...response.headers };
      const contentTypeHeader =
        headers['content-type'] ?? headers['Content-Type'] ?? '';
      const contentType = Array.isArray(contentTypeHeader)
        ? contentTypeHeader.join(', ')
        : String(contentTypeHeader);
      const isHtml = contentType.includes('text/html');
      const request: unknown = response.request;
      const finalUrl = this.readResponseUrl(request) ?? url;

      return {
        statusCode: response.status,
        contentType,
        isHtml,
        body: isHtml && typeof response.data === 'string' ? response.data : '',
        durationMs,
        finalUrl,
      };
    } catch (error) {
      const durationMs = Date.now() - start;
      const message = error instanceof Error ? error.message : String(error);

      this.logger.error(
        `Failed to fetch ${url} after ${durationMs}ms: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );

      throw error;
    }
  }

  // Node's http adapter exposes the post-redirect URL on request.res
  private readResponseUrl(request: unknown): string | undefined {
    if (typeof request !== 'object' || request === null || !('res' in request)) {
      return undefined;
    }
    const { res } = request;
    if (typeof res !== 'object' || res === null || !('responseUrl' in res)) {
      return undefined;
    }
    return typeof res.responseUrl === 'string' ? res.responseUrl : undefined;
  }
}
