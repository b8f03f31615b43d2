import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { sanitizeErrorMessage, sanitizeMetadata } from './utils/phi-sanitizer.util';

export enum DocumentEventType {
  SUMMARY_RECEIVED = 'SUMMARY_RECEIVED',
  SUMMARY_COMPLETED = 'SUMMARY_COMPLETED',
  SUMMARY_FAILED = 'SUMMARY_FAILED',
  SUMMARY_REPROCESSED = 'SUMMARY_REPROCESSED',
  SUMMARY_ACCESSED = 'SUMMARY_ACCESSED',
  BATCH_COMPLETED = 'BATCH_COMPLETED',
  MASTER_REPORT_GENERATED = 'MASTER_REPORT_GENERATED',
}

export interface DocumentEventData {
  event: DocumentEventType;
  summaryId?: string;
  documentKey?: string;
  documentType?: string;
  success: boolean;
  errorMessage?: string;
  metadata?: Record<string, unknown>; // Counts and identifiers only
}

/**
 * Audit Service for HIPAA-compliant logging of summary processing events
 *
 * HIPAA Requirements:
 * - Logs contain ids, timestamp, event type and outcome
 * - NO PHI: never page text, captions, extracted values or document names
 */
@Injectable()
export class AuditService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  logDocumentEvent(data: DocumentEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: 'clinical-summary-api',
      component: 'document-summaries',
      event: data.event,
      summaryId: data.summaryId,
      documentKey: data.documentKey,
      documentType: data.documentType,
      success: data.success,
      errorType: data.errorMessage
        ? sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: sanitizeMetadata(data.metadata) } : {}),
    };

    // Structured JSON logging, one event per line
    console.info(JSON.stringify(logEntry));
  }
}
