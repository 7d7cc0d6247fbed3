/**
 * Parsing Module - Export Index
 * Message normalization and thread identification
 */

export { EmailParser, EmailParserOptions, MESSAGE_ID_PATTERN, toMessageIdToken } from './EmailParser';
export { HtmlToTextConverter, ConverterOptions } from './HtmlToTextConverter';
export { ThreadIdentifier } from './ThreadIdentifier';

export {
  MessageAttachment,
  NormalizedMessage,
  ThreadedMessage,
  ThreadableMessage,
  ThreadIdKind,
  ThreadMerge,
  ThreadSummary,
  TextContent,
} from './types';
