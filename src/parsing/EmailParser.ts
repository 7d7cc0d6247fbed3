/**
 * Email Parser
 * Converts one raw mailbox record into a NormalizedMessage
 */

import crypto from 'crypto';
import { simpleParser, ParsedMail, AddressObject, Attachment } from 'mailparser';
import logger from '../utils/logger';
import { config } from '../config';
import { ParsingError, errorMessage, toError } from '../errors';
import { HtmlToTextConverter } from './HtmlToTextConverter';
import { MessageAttachment, NormalizedMessage, TextContent } from './types';

export interface EmailParserOptions {
  keywords?: string[];
  htmlConverter?: HtmlToTextConverter;
}

/** `<local@domain>` tokens as they appear in headers and quoted bodies */
export const MESSAGE_ID_PATTERN = /<[^<>@\s]+@[^<>\s]+>/g;

// RFC 5322 field name: printable ASCII except colon, followed by ':'
const HEADER_LINE = /^[!-9;-~]+:/;

export class EmailParser {
  private readonly keywords: string[];
  private readonly htmlConverter: HtmlToTextConverter;

  constructor(options: EmailParserOptions = {}) {
    const keywords = options.keywords ?? config.keywords;
    this.keywords = Array.from(
      new Set(keywords.map((kw) => kw.trim().toLowerCase()).filter(Boolean))
    );
    this.htmlConverter = options.htmlConverter ?? new HtmlToTextConverter();
  }

  /**
   * Parse a raw record. Throws ParsingError when the record is not an email.
   */
  async parse(raw: string | Buffer): Promise<NormalizedMessage> {
    const source = typeof raw === 'string' ? raw : raw.toString('utf-8');
    const record = source.replace(/^From .*\r?\n/, '');

    if (record.trim().length === 0) {
      throw ParsingError.emptyRecord();
    }

    const firstLine = record.replace(/^(\r?\n)+/, '').split(/\r?\n/, 1)[0];
    if (!HEADER_LINE.test(firstLine)) {
      throw ParsingError.notAnEmail(`first line is not a header: "${firstLine.substring(0, 60)}"`);
    }

    let message: ParsedMail;
    try {
      message = await simpleParser(record);
    } catch (error: unknown) {
      throw ParsingError.mimeFailure(toError(error) ?? new Error(errorMessage(error)));
    }

    const body = this.extractBestTextContent(message);
    if (message.headers.size === 0 && body.text.length === 0) {
      throw ParsingError.notAnEmail('no headers and no content');
    }

    const subject = (message.subject ?? '').trim();

    return {
      message_id: this.extractMessageId(message, record),
      date: this.extractDate(message),
      sender: this.addressText(message.from),
      receiver: this.addressText(message.to),
      subject,
      content: body.text,
      references: this.extractReferences(message),
      attachments: this.extractAttachments(message),
      keywords: this.matchKeywords(subject, body.text),
    };
  }

  /**
   * Message-ID header, or a synthetic id derived from the record bytes so
   * that re-parsing the same record yields the same id
   */
  private extractMessageId(message: ParsedMail, record: string): string {
    const header = message.messageId?.trim();
    if (header) {
      return toMessageIdToken(header) ?? header;
    }

    const digest = crypto.createHash('sha256').update(record).digest('hex');
    const syntheticId = `<generated-${digest.substring(0, 16)}@synthetic>`;
    logger.debug('Generated synthetic Message-ID', { syntheticId });
    return syntheticId;
  }

  private extractDate(message: ParsedMail): string {
    if (!message.headers.has('date') || !message.date || isNaN(message.date.getTime())) {
      return '';
    }
    return message.date.toISOString();
  }

  private addressText(address: AddressObject | AddressObject[] | undefined): string {
    if (!address) {
      return '';
    }
    const list = Array.isArray(address) ? address : [address];
    return list
      .map((entry) => entry.text.trim())
      .filter(Boolean)
      .join(', ');
  }

  /**
   * In-Reply-To and References, in header order, de-duplicated
   */
  private extractReferences(message: ParsedMail): string[] {
    const raw: string[] = [];

    if (message.inReplyTo) {
      raw.push(message.inReplyTo);
    }
    if (Array.isArray(message.references)) {
      raw.push(...message.references);
    } else if (message.references) {
      raw.push(message.references);
    }

    const seen = new Set<string>();
    for (const entry of raw) {
      for (const piece of entry.split(/[\s,]+/)) {
        const token = toMessageIdToken(piece);
        if (token) {
          seen.add(token);
        }
      }
    }

    return Array.from(seen);
  }

  /**
   * Prefers text/plain, falls back to HTML converted to text
   */
  extractBestTextContent(message: ParsedMail): TextContent {
    if (message.text && message.text.trim().length > 0) {
      return { text: message.text.trim(), source: 'plain' };
    }

    if (message.html) {
      return { text: this.htmlConverter.convert(message.html), source: 'html' };
    }

    return { text: '', source: 'none' };
  }

  private extractAttachments(message: ParsedMail): MessageAttachment[] {
    if (!message.attachments || message.attachments.length === 0) {
      return [];
    }

    return message.attachments.map((attachment: Attachment) => ({
      filename: attachment.filename || 'unnamed',
      mime_type: attachment.contentType || 'application/octet-stream',
      size: attachment.size || attachment.content.length,
      content: attachment.content,
    }));
  }

  /**
   * Configured keywords present in subject or content, case-insensitive
   */
  matchKeywords(subject: string, content: string): string[] {
    if (this.keywords.length === 0) {
      return [];
    }

    const subjectLower = subject.toLowerCase();
    const contentLower = content.toLowerCase();

    return this.keywords.filter(
      (kw) => subjectLower.includes(kw) || contentLower.includes(kw)
    );
  }
}

/**
 * Normalize a header value to `<id>` form, or null when it carries no id
 */
export function toMessageIdToken(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  const match = trimmed.match(new RegExp(MESSAGE_ID_PATTERN.source));
  if (match) {
    return match[0];
  }

  const bare = trimmed.replace(/^<|>$/g, '');
  if (bare.includes('@') && !/[\s<>]/.test(bare)) {
    return `<${bare}>`;
  }

  return trimmed.startsWith('<') && trimmed.endsWith('>') ? trimmed : null;
}
