/**
 * SQLite Email Store
 * Persists messages, thread metadata and attachments with better-sqlite3.
 * Inserts are idempotent on message_id, so re-ingesting a mailbox never
 * duplicates rows.
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { v5 as uuidv5 } from 'uuid';
import { z } from 'zod';
import logger from '../utils/logger';
import { StorageError, errorMessage, toError } from '../errors';
import { ThreadedMessage, ThreadMerge, ThreadSummary } from '../parsing/types';
import { AttachmentStore, EmailStorage, StoredAttachment, StoredEmail } from './types';

// Namespace for deterministic attachment ids
const ATTACHMENT_NAMESPACE = '3b8f2a64-5c1d-4e7a-9d20-6f4c8e1b7a53';

const stringListSchema = z.array(z.string());

interface EmailRow {
  message_id: string;
  date: string | null;
  sender: string | null;
  receiver: string | null;
  subject: string | null;
  content: string | null;
  keywords: string | null;
  thread_id: string | null;
}

interface ThreadRow {
  thread_id: string;
  subject: string | null;
  participants: string | null;
  start_date: string | null;
  last_update: string | null;
  message_count: number;
}

interface AttachmentRow {
  id: string;
  message_id: string;
  filename: string;
  mime_type: string;
  size: number;
  content: Buffer;
  ocr_text: string | null;
}

export class SqliteEmailStore implements EmailStorage, AttachmentStore {
  private readonly db: Database.Database;
  private readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;

    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    try {
      this.initializeSchema();
    } catch (error: unknown) {
      this.db.close();
      throw StorageError.schemaFailed(toError(error));
    }

    logger.info('Email store opened', { dbPath });
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS emails (
        message_id TEXT PRIMARY KEY,
        date TEXT,
        sender TEXT,
        receiver TEXT,
        subject TEXT,
        content TEXT,
        keywords TEXT,
        thread_id TEXT,
        created_at TEXT
      );

      CREATE TABLE IF NOT EXISTS email_threads (
        thread_id TEXT PRIMARY KEY,
        subject TEXT,
        participants TEXT,
        start_date TEXT,
        last_update TEXT,
        message_count INTEGER DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS attachments (
        id TEXT PRIMARY KEY,
        message_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        filename TEXT,
        mime_type TEXT,
        size INTEGER,
        content BLOB,
        ocr_text TEXT,
        FOREIGN KEY (message_id) REFERENCES emails(message_id)
      );

      CREATE INDEX IF NOT EXISTS idx_emails_date ON emails(date);
      CREATE INDEX IF NOT EXISTS idx_emails_thread_id ON emails(thread_id);
      CREATE INDEX IF NOT EXISTS idx_attachments_message_id ON attachments(message_id);
    `);

    logger.debug('Email store schema initialized');
  }

  async insert(messages: ThreadedMessage[]): Promise<number> {
    if (messages.length === 0) {
      return 0;
    }

    try {
      const inserted = this.insertTransaction(messages);
      logger.debug('Messages stored', { received: messages.length, inserted });
      return inserted;
    } catch (error: unknown) {
      logger.error('Message insert failed', { count: messages.length, error: errorMessage(error) });
      throw StorageError.insertFailed(messages.length, toError(error));
    }
  }

  private insertTransaction(messages: ThreadedMessage[]): number {
    const insertEmail = this.db.prepare(`
      INSERT OR IGNORE INTO emails (
        message_id, date, sender, receiver, subject, content, keywords, thread_id, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertAttachment = this.db.prepare(`
      INSERT OR IGNORE INTO attachments (
        id, message_id, position, filename, mime_type, size, content
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    const transaction = this.db.transaction((batch: ThreadedMessage[]) => {
      let inserted = 0;
      const now = new Date().toISOString();

      for (const message of batch) {
        const result = insertEmail.run(
          message.message_id,
          message.date || null,
          message.sender,
          message.receiver,
          message.subject,
          message.content,
          JSON.stringify(message.keywords),
          message.thread_id,
          now
        );
        if (result.changes === 0) {
          continue;
        }
        inserted++;

        message.attachments.forEach((attachment, position) => {
          insertAttachment.run(
            uuidv5(`${message.message_id}:${position}`, ATTACHMENT_NAMESPACE),
            message.message_id,
            position,
            attachment.filename,
            attachment.mime_type,
            attachment.size,
            attachment.content
          );
        });
      }

      return inserted;
    });

    return transaction(messages);
  }

  /**
   * Merge a thread summary into the stored row. Participants accumulate, the
   * date span widens, message_count is recounted from stored emails.
   */
  async upsertThread(summary: ThreadSummary): Promise<void> {
    try {
      this.db.transaction((incoming: ThreadSummary) => {
        const existing = this.readThread(incoming.thread_id);
        this.writeThread(existing ? combineSummaries(existing, incoming) : incoming);
      })(summary);
    } catch (error: unknown) {
      logger.error('Thread update failed', { threadId: summary.thread_id, error: errorMessage(error) });
      throw StorageError.threadUpdateFailed(summary.thread_id, toError(error));
    }
  }

  async mergeThreads(merges: ThreadMerge[]): Promise<void> {
    if (merges.length === 0) {
      return;
    }

    try {
      this.applyMerges(merges);
      logger.debug('Thread merges applied', { count: merges.length });
    } catch (error: unknown) {
      logger.error('Thread merge failed', { count: merges.length, error: errorMessage(error) });
      throw StorageError.mergeFailed(merges.length, toError(error));
    }
  }

  private applyMerges(merges: ThreadMerge[]): void {
    const transaction = this.db.transaction((pending: ThreadMerge[]) => {
      const repoint = this.db.prepare('UPDATE emails SET thread_id = ? WHERE thread_id = ?');
      const removeThread = this.db.prepare('DELETE FROM email_threads WHERE thread_id = ?');

      for (const { from, into } of pending) {
        repoint.run(into, from);

        const absorbed = this.readThread(from);
        const canonical = this.readThread(into);
        if (absorbed) {
          removeThread.run(from);
        }

        const base = canonical ?? (absorbed ? { ...absorbed, thread_id: into } : null);
        if (base) {
          this.writeThread(absorbed && canonical ? combineSummaries(canonical, absorbed) : base);
        }
      }
    });

    transaction(merges);
  }

  getEmail(messageId: string): StoredEmail | null {
    const row = this.db
      .prepare<[string], EmailRow>('SELECT * FROM emails WHERE message_id = ?')
      .get(messageId);

    if (!row) {
      return null;
    }

    return {
      message_id: row.message_id,
      date: row.date ?? '',
      sender: row.sender ?? '',
      receiver: row.receiver ?? '',
      subject: row.subject ?? '',
      content: row.content ?? '',
      keywords: parseStringList(row.keywords),
      thread_id: row.thread_id,
    };
  }

  getThread(threadId: string): ThreadSummary | null {
    return this.readThread(threadId);
  }

  countEmails(threadId?: string): number {
    const row =
      threadId === undefined
        ? this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM emails').get()
        : this.db
            .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM emails WHERE thread_id = ?')
            .get(threadId);
    return row?.total ?? 0;
  }

  countThreads(): number {
    const row = this.db
      .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM email_threads')
      .get();
    return row?.total ?? 0;
  }

  listAttachmentIds(options: { pendingOcrOnly?: boolean } = {}): string[] {
    const sql = options.pendingOcrOnly
      ? 'SELECT id FROM attachments WHERE ocr_text IS NULL ORDER BY message_id, position'
      : 'SELECT id FROM attachments ORDER BY message_id, position';
    return this.db
      .prepare<[], { id: string }>(sql)
      .all()
      .map((row) => row.id);
  }

  getAttachment(id: string): StoredAttachment | null {
    const row = this.db
      .prepare<[string], AttachmentRow>(
        'SELECT id, message_id, filename, mime_type, size, content, ocr_text FROM attachments WHERE id = ?'
      )
      .get(id);
    return row ?? null;
  }

  saveOcrText(id: string, text: string): void {
    const result = this.db.prepare('UPDATE attachments SET ocr_text = ? WHERE id = ?').run(text, id);
    if (result.changes === 0) {
      logger.warn('OCR text for unknown attachment ignored', { attachmentId: id });
    }
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
      logger.info('Email store closed', { dbPath: this.dbPath });
    }
  }

  private readThread(threadId: string): ThreadSummary | null {
    const row = this.db
      .prepare<[string], ThreadRow>('SELECT * FROM email_threads WHERE thread_id = ?')
      .get(threadId);

    if (!row) {
      return null;
    }

    return {
      thread_id: row.thread_id,
      subject: row.subject ?? '',
      participants: parseStringList(row.participants),
      start_date: row.start_date,
      last_update: row.last_update,
      message_count: row.message_count,
    };
  }

  private writeThread(summary: ThreadSummary): void {
    const stored = this.countEmails(summary.thread_id);

    this.db
      .prepare(
        `INSERT OR REPLACE INTO email_threads (
          thread_id, subject, participants, start_date, last_update, message_count
        ) VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        summary.thread_id,
        summary.subject,
        JSON.stringify(summary.participants),
        summary.start_date,
        summary.last_update,
        stored > 0 ? stored : summary.message_count
      );
  }
}

function parseStringList(value: string | null): string[] {
  if (!value) {
    return [];
  }
  try {
    const parsed = stringListSchema.safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : [];
  } catch (error: unknown) {
    logger.warn('Unparseable list column', { value: value.substring(0, 60), error: errorMessage(error) });
    return [];
  }
}

function earliest(a: string | null, b: string | null): string | null {
  if (!a) return b;
  if (!b) return a;
  return a < b ? a : b;
}

function latest(a: string | null, b: string | null): string | null {
  if (!a) return b;
  if (!b) return a;
  return a > b ? a : b;
}

/**
 * Fold `incoming` into `base`, keeping base's id and (non-empty) subject
 */
export function combineSummaries(base: ThreadSummary, incoming: ThreadSummary): ThreadSummary {
  return {
    thread_id: base.thread_id,
    subject: base.subject || incoming.subject,
    participants: Array.from(new Set([...base.participants, ...incoming.participants])).sort(),
    start_date: earliest(base.start_date, incoming.start_date),
    last_update: latest(base.last_update, incoming.last_update),
    message_count: base.message_count + incoming.message_count,
  };
}
