export { SqliteEmailStore, combineSummaries } from './SqliteEmailStore';
export { backfillOcrText, OcrBackfillResult } from './ocrBackfill';
export { backupDatabase } from './backup';
export { AttachmentStore, EmailStorage, OcrService, StoredAttachment, StoredEmail } from './types';
