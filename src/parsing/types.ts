/**
 * Parsing Types
 * Type definitions for normalized messages and thread identification
 */

export interface MessageAttachment {
  filename: string;
  mime_type: string;
  size: number;
  content: Buffer;
}

export interface NormalizedMessage {
  message_id: string;
  date: string; // ISO-8601 UTC, empty when unknown
  sender: string;
  receiver: string;
  subject: string;
  content: string;
  references: string[]; // In-Reply-To + References tokens
  attachments: MessageAttachment[];
  keywords: string[];
}

export interface ThreadedMessage extends NormalizedMessage {
  thread_id: string | null;
}

/**
 * The subset of a message the thread identifier looks at
 */
export type ThreadableMessage = Pick<NormalizedMessage, 'message_id'> &
  Partial<Pick<NormalizedMessage, 'subject' | 'content' | 'references'>>;

export type ThreadIdKind = 'thread' | 'subject' | 'singleton';

export interface ThreadMerge {
  from: string; // absorbed thread id
  into: string; // canonical thread id
}

export interface ThreadSummary {
  thread_id: string;
  subject: string;
  participants: string[];
  start_date: string | null;
  last_update: string | null;
  message_count: number;
}

export interface TextContent {
  text: string;
  source: 'plain' | 'html' | 'none';
}
