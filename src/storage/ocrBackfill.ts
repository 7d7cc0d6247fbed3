/**
 * Runs an OCR service over stored attachments that have no text yet.
 * Ingestion never calls this; it is a separate pass over the store.
 */

import logger from '../utils/logger';
import { errorMessage } from '../errors';
import { AttachmentStore, OcrService } from './types';

export interface OcrBackfillResult {
  processed: number;
  failed: number;
}

export async function backfillOcrText(
  store: AttachmentStore,
  service: OcrService
): Promise<OcrBackfillResult> {
  const result: OcrBackfillResult = { processed: 0, failed: 0 };

  for (const id of store.listAttachmentIds({ pendingOcrOnly: true })) {
    const attachment = store.getAttachment(id);
    if (!attachment) continue;

    try {
      const text = await service.extractText(attachment);
      store.saveOcrText(id, text);
      result.processed++;
    } catch (error: unknown) {
      result.failed++;
      logger.warn('OCR failed for attachment', {
        attachmentId: id,
        filename: attachment.filename,
        error: errorMessage(error),
      });
    }
  }

  logger.info('OCR backfill complete', { ...result });
  return result;
}
