/**
 * Storage Types
 * Contracts between ingestion and whatever persists messages and threads
 */

import { ThreadedMessage, ThreadMerge, ThreadSummary } from '../parsing/types';

/**
 * Persistence collaborator for ingestion. Implementations surface failures
 * as StorageError.
 */
export interface EmailStorage {
  /**
   * Insert messages, ignoring any whose message_id is already stored.
   * Resolves with the number of rows actually inserted.
   */
  insert(messages: ThreadedMessage[]): Promise<number>;
  upsertThread(summary: ThreadSummary): Promise<void>;
  /** Re-point stored rows of absorbed threads at their canonical thread */
  mergeThreads(merges: ThreadMerge[]): Promise<void>;
  close(): Promise<void>;
}

export interface StoredAttachment {
  id: string;
  message_id: string;
  filename: string;
  mime_type: string;
  size: number;
  content: Buffer;
  ocr_text: string | null;
}

/**
 * Text extraction for attachments, run outside ingestion
 */
export interface OcrService {
  extractText(attachment: StoredAttachment): Promise<string>;
}

/**
 * Attachment access a store offers to OCR
 */
export interface AttachmentStore {
  listAttachmentIds(options?: { pendingOcrOnly?: boolean }): string[];
  getAttachment(id: string): StoredAttachment | null;
  saveOcrText(id: string, text: string): void;
}

export interface StoredEmail {
  message_id: string;
  date: string;
  sender: string;
  receiver: string;
  subject: string;
  content: string;
  keywords: string[];
  thread_id: string | null;
}
