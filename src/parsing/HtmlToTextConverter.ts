/**
 * HTML to Text Converter
 * Turns HTML-only message bodies into searchable plain text
 */

import { convert as htmlToText, HtmlToTextOptions } from 'html-to-text';
import logger from '../utils/logger';
import { errorMessage } from '../errors';

export interface ConverterOptions {
  preserve_links?: boolean;
  max_line_length?: number;
  word_wrap?: boolean;
}

const DEFAULT_OPTIONS: Required<ConverterOptions> = {
  preserve_links: false,
  max_line_length: 80,
  word_wrap: false,
};

const NAMED_ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
};

export class HtmlToTextConverter {
  private options: Required<ConverterOptions>;

  constructor(options: ConverterOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Convert HTML to plain text
   */
  convert(html: string): string {
    if (!html || html.trim().length === 0) {
      return '';
    }

    try {
      const htmlToTextOptions: HtmlToTextOptions = {
        wordwrap: this.options.word_wrap ? this.options.max_line_length : false,
        preserveNewlines: true,
        selectors: [
          { selector: 'script', format: 'skip' },
          { selector: 'style', format: 'skip' },
          { selector: 'head', format: 'skip' },
          { selector: 'img', format: 'skip' },
          {
            selector: 'a',
            options: {
              ignoreHref: !this.options.preserve_links,
            },
          },
          { selector: 'p', options: { leadingLineBreaks: 2, trailingLineBreaks: 2 } },
          { selector: 'br', format: 'lineBreak' },
        ],
      };

      return this.normalizeWhitespace(htmlToText(html, htmlToTextOptions));
    } catch (error: unknown) {
      logger.warn('Error converting HTML to text', {
        error: errorMessage(error),
        htmlPreview: html.substring(0, 100),
      });

      return this.stripHtmlTags(html);
    }
  }

  /**
   * Strip HTML tags (fallback when the converter throws)
   */
  stripHtmlTags(html: string): string {
    if (!html) return '';

    let text = html;

    text = text.replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '');
    text = text.replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '');
    text = text.replace(/<br\s*\/?>/gi, '\n');
    text = text.replace(/<\/p>/gi, '\n\n');
    text = text.replace(/<[^>]+>/g, '');

    return this.normalizeWhitespace(this.decodeHtmlEntities(text));
  }

  private decodeHtmlEntities(text: string): string {
    let result = text;

    for (const [entity, char] of Object.entries(NAMED_ENTITIES)) {
      result = result.replace(new RegExp(entity, 'gi'), char);
    }

    result = result.replace(/&#(\d+);/g, (_match, dec: string) =>
      String.fromCharCode(parseInt(dec, 10))
    );

    return result.replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) =>
      String.fromCharCode(parseInt(hex, 16))
    );
  }

  /**
   * Collapse runs of spaces, cap blank lines at one, trim each line
   */
  private normalizeWhitespace(text: string): string {
    return text
      .replace(/[ \t]+/g, ' ')
      .replace(/\n{3,}/g, '\n\n')
      .split('\n')
      .map((line) => line.trim())
      .join('\n')
      .trim();
  }
}
