import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { hasErrorCode } from '../../common/utils/fs-errors';

const URL_IN_LINE = /https?:\/\/\S+/;

/** Reads the list of sites for batch crawls, one URL per line. */
@Injectable()
export class SiteListService {
  private readonly logger = new Logger(SiteListService.name);
  private readonly listPath: string;

  constructor(private readonly configService: ConfigService) {
    this.listPath = path.resolve(
      this.configService.get<string>('SITE_LIST_PATH', 'list_of_website.txt'),
    );
  }

  async readUrls(): Promise<string[]> {
    try {
      const text = await fs.readFile(this.listPath, 'utf-8');
      return this.extractUrls(text);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        this.logger.warn(`Site list ${this.listPath} not found`);
      } else {
        this.logger.error(`Failed to read site list ${this.listPath}`, error);
      }
      return [];
    }
  }

  /** First URL on each line; blank lines and lines without one are skipped. */
  extractUrls(text: string): string[] {
    const urls: string[] = [];
    for (const line of text.split(/\r?\n/)) {
      const match = URL_IN_LINE.exec(line.trim());
      if (match) {
        urls.push(match[0]);
      }
    }
    return urls;
  }
}
