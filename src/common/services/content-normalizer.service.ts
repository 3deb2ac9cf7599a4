import { Injectable } from '@nestjs/common';
import * as cheerio from 'cheerio';

const MARKDOWN_IMAGE = /!\[[^\]]*\]\([^)]*\)/g;
const MARKDOWN_LINK = /\[([^\]]+)\]\([^)]*\)/g;
const MARKDOWN_MARKERS = /(\*\*|__|\*|_|#+\s*|`|>|- )/g;
const LEFTOVER_ENTITY = /&(#\d+|#x[0-9a-f]+|[a-z][a-z0-9]*);/gi;

/**
 * Flattens extracted page content (markdown, HTML or a mix of both) into a
 * single line of plain text for tabular export.
 */
@Injectable()
export class ContentNormalizerService {
  normalize(input: string | null | undefined): string {
    if (!input) {
      return '';
    }

    // Removing one marker can expose another, so repeat until stable.
    // A pass only ever removes characters or collapses whitespace.
    let current = input;
    let next = this.cleanOnce(current);
    while (next !== current) {
      current = next;
      next = this.cleanOnce(current);
    }
    return next;
  }

  /** Visible text of the markup, with a space at every element boundary. */
  stripTags(markup: string): string {
    if (!markup.includes('<') && !markup.includes('&')) {
      return markup;
    }

    const $ = cheerio.load(markup);
    $('script, style, noscript, template').remove();
    $('*').each((_, element) => {
      $(element).prepend(' ').append(' ');
    });
    return $.root().text();
  }

  private cleanOnce(text: string): string {
    return this.stripTags(text)
      .replace(MARKDOWN_IMAGE, '')
      .replace(MARKDOWN_LINK, '$1')
      .replace(MARKDOWN_MARKERS, '')
      .replace(LEFTOVER_ENTITY, '')
      .replace(/\s+/g, ' ')
      .trim();
  }
}
