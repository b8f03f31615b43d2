import {
  BadRequestException,
  ConflictException,
  HttpException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentSummaryRepositoryPort } from '../ports/document-summary.repository.port';
import { ArtifactStoragePort } from '../ports/artifact-storage.port';
import { DocumentSummary } from '../entities/document-summary.entity';
import { SourceDocument } from '../entities/source-document.entity';
import { SummaryStatus } from '../enums/summary-status.enum';
import { SummaryStateMachine } from '../utils/summary-state-machine.util';
import { SummaryGenerationException } from '../errors/summary-generation.exception';
import { AuditService, DocumentEventType } from '../../../audit/audit.service';
import { sanitizeErrorMessage } from '../../../audit/utils/phi-sanitizer.util';
import { AllConfigType } from '../../../config/config.type';
import {
  countExtractedFields,
  extractDocumentData,
  summaryFieldsFrom,
} from '../../utils/extractors';
import {
  artifactFolderFor,
  buildDocumentKey,
  summaryArtifactPaths,
} from '../../utils/document-key.util';
import { renderSummaryMarkdown } from '../../utils/summary-markdown.renderer';
import { parseSummaryMarkdown } from '../../utils/summary-markdown.parser';
import { collapseWhitespace } from '../../utils/extractors/pattern.util';
import { VectorPayload, buildVectorPayload } from '../../utils/vector-payload';
import {
  ReportFailureEntry,
  RunStatistics,
  buildMasterReport,
} from '../../utils/master-report.builder';
import { SummaryQueryOptions } from '../ports/document-summary.repository.port';

export const MASTER_REPORT_PATH = 'MASTER_REPORT.md';
export const DOCUMENT_INDEX_PATH = 'document_index.json';

export interface ProcessedDocument {
  summaryId: string;
  file: string;
  type: DocumentSummary['documentType'];
  confidence: number;
  folder: string;
  chunks: number;
}

export interface FailedDocument extends ReportFailureEntry {
  summaryId?: string; // Set when a FAILED record was persisted
}

export interface MasterReportResult {
  markdownLocation: string;
  indexLocation: string;
  statistics: RunStatistics;
}

export interface RunResult {
  processed: ProcessedDocument[];
  failed: FailedDocument[];
  report: MasterReportResult;
}

function errorText(error: unknown): string {
  if (error instanceof HttpException) {
    return error.message;
  }
  return sanitizeErrorMessage(
    error instanceof Error ? error.message : String(error),
  );
}

/**
 * DocumentSummaryDomainService
 *
 * Turns extraction records into document summaries:
 * validate → persist RECEIVED → EXTRACTING → extract, chunk, render,
 * write artifacts → SUMMARIZED (or FAILED).
 *
 * HIPAA Compliance:
 * - Page text, captions and extracted values never reach logs or audit events
 * - Stored error messages are sanitized
 */
@Injectable()
export class DocumentSummaryDomainService {
  private readonly logger = new Logger(DocumentSummaryDomainService.name);

  constructor(
    @Inject('DocumentSummaryRepositoryPort')
    private readonly summaryRepository: DocumentSummaryRepositoryPort,
    @Inject('ArtifactStoragePort')
    private readonly artifactStorage: ArtifactStoragePort,
    private readonly auditService: AuditService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async summarizeDocument(source: SourceDocument): Promise<DocumentSummary> {
    this.assertValidSource(source);

    const documentType = source.classification.documentType;
    // Both end up on single-line Markdown fields
    const documentName = collapseWhitespace(source.documentName);
    const sourceText = [...source.pages]
      .sort((a, b) => a.pageNumber - b.pageNumber)
      .map((page) => page.text)
      .join('\n');

    const summary = await this.summaryRepository.create({
      documentKey: buildDocumentKey(documentName),
      documentName,
      documentType,
      confidence: source.classification.confidence,
      status: SummaryStatus.RECEIVED,
      pageCount: source.pageCount,
      extractedImages: (source.images ?? []).map((image) => ({
        pageNumber: image.pageNumber,
        index: image.index,
        captionText: collapseWhitespace(image.captionText ?? ''),
        classificationTag: image.classificationTag,
      })),
      sourceText,
      chunkCount: 0,
      artifactFolder: artifactFolderFor(documentType, documentName),
    });

    this.logger.log(
      `[SUMMARIES] Received summary ${summary.id} (${documentType}, ${source.pageCount} pages)`,
    );
    this.auditService.logDocumentEvent({
      event: DocumentEventType.SUMMARY_RECEIVED,
      summaryId: summary.id,
      documentKey: summary.documentKey,
      documentType,
      success: true,
      metadata: {
        pageCount: source.pageCount,
        imageCount: summary.extractedImages.length,
      },
    });

    return this.runExtraction(summary);
  }

  /**
   * Records are processed in order; a failing record is listed and the run
   * continues. The run ends with the master report.
   *
   * @param preFailures Records rejected before reaching the service
   *   (unreadable files, invalid JSON)
   */
  async processBatch(
    sources: SourceDocument[],
    preFailures: FailedDocument[] = [],
  ): Promise<RunResult> {
    const maxBatchSize = this.configService.getOrThrow(
      'summaries.maxBatchSize',
      { infer: true },
    );
    if (sources.length > maxBatchSize) {
      throw new BadRequestException(
        `Batch of ${sources.length} records exceeds the limit of ${maxBatchSize}`,
      );
    }

    const processed: ProcessedDocument[] = [];
    const failed: FailedDocument[] = [...preFailures];

    for (const source of sources) {
      try {
        const summary = await this.summarizeDocument(source);
        processed.push({
          summaryId: summary.id,
          file: summary.documentName,
          type: summary.documentType,
          confidence: summary.confidence,
          folder: summary.artifactFolder,
          chunks: summary.chunkCount,
        });
      } catch (error) {
        failed.push({
          file: source.documentName,
          error: errorText(error),
          ...(error instanceof SummaryGenerationException
            ? { summaryId: error.summaryId }
            : {}),
        });
      }
    }

    this.logger.log(
      `[SUMMARIES] Batch finished: ${processed.length} summarized, ${failed.length} failed`,
    );
    this.auditService.logDocumentEvent({
      event: DocumentEventType.BATCH_COMPLETED,
      success: failed.length === 0,
      metadata: {
        submitted: sources.length + preFailures.length,
        summarized: processed.length,
        failed: failed.length,
      },
    });

    // Persisted failures are read back from the repository
    const report = await this.generateMasterReport(
      failed.filter((failure) => failure.summaryId === undefined),
    );

    return { processed, failed, report };
  }

  async reprocessSummary(id: string): Promise<DocumentSummary> {
    const summary = await this.getSummaryOrThrow(id);

    if (!SummaryStateMachine.canReprocess(summary.status)) {
      throw new BadRequestException(
        `Summary ${id} cannot be reprocessed while ${summary.status}`,
      );
    }

    this.auditService.logDocumentEvent({
      event: DocumentEventType.SUMMARY_REPROCESSED,
      summaryId: summary.id,
      documentKey: summary.documentKey,
      documentType: summary.documentType,
      success: true,
      metadata: { previousStatus: summary.status },
    });

    return this.runExtraction(summary);
  }

  async getSummary(id: string): Promise<DocumentSummary> {
    const summary = await this.getSummaryOrThrow(id);
    this.logAccess(summary, 'summary');
    return summary;
  }

  async listSummaries(
    options: SummaryQueryOptions,
  ): Promise<{ data: DocumentSummary[]; total: number }> {
    return this.summaryRepository.findMany(options);
  }

  /**
   * Stored Markdown artifact, re-rendered when the artifact is missing
   */
  async getSummaryMarkdown(id: string): Promise<string> {
    const summary = await this.getSummarizedOrThrow(id);
    this.logAccess(summary, 'markdown');

    const stored = summary.markdownPath
      ? await this.artifactStorage.readText(summary.markdownPath)
      : null;
    if (stored !== null && this.isArtifactOf(stored, summary)) {
      return stored;
    }

    // Same-named documents share an artifact folder; a later run may have
    // overwritten this summary's file
    this.logger.warn(
      `[SUMMARIES] Markdown artifact ${stored === null ? 'missing' : 'superseded'} for ${summary.id}, re-rendering`,
    );
    return renderSummaryMarkdown(
      { ...summary, processedAt: summary.processedAt ?? summary.updatedAt },
      { maxImages: this.maxImages() },
    );
  }

  async getVectorPayload(id: string): Promise<VectorPayload> {
    const summary = await this.getSummarizedOrThrow(id);
    this.logAccess(summary, 'chunks');
    return buildVectorPayload({
      ...summary,
      processedAt: summary.processedAt ?? summary.updatedAt,
    });
  }

  /**
   * Write MASTER_REPORT.md and document_index.json over every summary
   *
   * @param extraFailures Failures with no persisted record
   */
  async generateMasterReport(
    extraFailures: ReportFailureEntry[] = [],
  ): Promise<MasterReportResult> {
    const summaries = await this.summaryRepository.findAll();

    const report = buildMasterReport({
      generatedAt: new Date(),
      outputLocation: this.artifactStorage.describeLocation(),
      documents: summaries
        .filter((summary) => summary.status === SummaryStatus.SUMMARIZED)
        .map((summary) => ({
          file: summary.documentName,
          type: summary.documentType,
          confidence: summary.confidence,
          folder: summary.artifactFolder,
          chunks: summary.chunkCount,
        })),
      failed: [
        ...summaries
          .filter((summary) => summary.status === SummaryStatus.FAILED)
          .map((summary) => ({
            file: summary.documentName,
            error: summary.errorMessage || 'Unknown error',
          })),
        ...extraFailures.map(({ file, error }) => ({ file, error })),
      ],
    });

    const markdownLocation = await this.artifactStorage.writeText(
      MASTER_REPORT_PATH,
      report.markdown,
      'text/markdown; charset=utf-8',
    );
    const indexLocation = await this.artifactStorage.writeJson(
      DOCUMENT_INDEX_PATH,
      report.index,
    );

    this.auditService.logDocumentEvent({
      event: DocumentEventType.MASTER_REPORT_GENERATED,
      success: true,
      metadata: {
        totalProcessed: report.index.statistics.totalProcessed,
        totalFailed: report.index.statistics.totalFailed,
        byType: report.index.statistics.byType,
      },
    });

    return {
      markdownLocation,
      indexLocation,
      statistics: report.index.statistics,
    };
  }

  private async runExtraction(
    summary: DocumentSummary,
  ): Promise<DocumentSummary> {
    SummaryStateMachine.validateTransition(
      summary.status,
      SummaryStatus.EXTRACTING,
    );
    await this.summaryRepository.updateStatus(
      summary.id,
      SummaryStatus.EXTRACTING,
      { errorMessage: null },
    );

    try {
      if (!summary.sourceText.trim()) {
        throw new Error('No extractable text');
      }

      const extractedData = extractDocumentData(
        summary.documentType,
        summary.sourceText,
      );
      const processedAt = new Date();
      const payload = buildVectorPayload({
        ...summary,
        extractedData,
        processedAt,
      });

      const paths = summaryArtifactPaths(
        summary.artifactFolder,
        summary.documentName,
      );
      const markdown = renderSummaryMarkdown(
        { ...summary, extractedData, processedAt },
        { maxImages: this.maxImages() },
      );

      await this.artifactStorage.writeText(
        paths.markdown,
        markdown,
        'text/markdown; charset=utf-8',
      );
      await this.artifactStorage.writeJson(paths.vectorDb, payload);
      await this.artifactStorage.writeJson(paths.extractionReport, {
        documentType: summary.documentType,
        confidence: summary.confidence,
        extractionStats: {
          totalPages: summary.pageCount,
          textChunks: payload.textChunks.length,
          imageChunks: payload.imageChunks.length,
          extractedFields: countExtractedFields(extractedData),
        },
      });

      const fields = {
        ...summaryFieldsFrom(extractedData),
        extractedData,
        chunkCount: payload.totalChunks,
        markdownPath: paths.markdown,
        processedAt,
        errorMessage: null,
      };
      await this.summaryRepository.updateStatus(
        summary.id,
        SummaryStatus.SUMMARIZED,
        fields,
      );

      this.logger.log(
        `[SUMMARIES] Summary ${summary.id} summarized (${payload.textChunks.length} text chunks, ${payload.imageChunks.length} image chunks)`,
      );
      this.auditService.logDocumentEvent({
        event: DocumentEventType.SUMMARY_COMPLETED,
        summaryId: summary.id,
        documentKey: summary.documentKey,
        documentType: summary.documentType,
        success: true,
        metadata: {
          chunkCount: payload.totalChunks,
          extractedFields: countExtractedFields(extractedData),
        },
      });

      return {
        ...summary,
        ...fields,
        status: SummaryStatus.SUMMARIZED,
        updatedAt: new Date(),
      };
    } catch (error) {
      const reason = sanitizeErrorMessage(
        error instanceof Error ? error.message : String(error),
      );

      await this.summaryRepository.updateStatus(
        summary.id,
        SummaryStatus.FAILED,
        { errorMessage: reason },
      );

      this.logger.error(`[SUMMARIES] Summary ${summary.id} failed: ${reason}`);
      this.auditService.logDocumentEvent({
        event: DocumentEventType.SUMMARY_FAILED,
        summaryId: summary.id,
        documentKey: summary.documentKey,
        documentType: summary.documentType,
        success: false,
        errorMessage: reason,
      });

      throw new SummaryGenerationException(summary.id, reason);
    }
  }

  private assertValidSource(source: SourceDocument): void {
    if (source.pages.length === 0) {
      throw new BadRequestException('Extraction record has no pages');
    }

    const seen = new Set<number>();
    for (const page of source.pages) {
      if (page.pageNumber < 1 || page.pageNumber > source.pageCount) {
        throw new BadRequestException(
          `Page ${page.pageNumber} is outside 1-${source.pageCount}`,
        );
      }
      if (seen.has(page.pageNumber)) {
        throw new BadRequestException(
          `Page ${page.pageNumber} appears more than once`,
        );
      }
      seen.add(page.pageNumber);
    }

    for (const image of source.images ?? []) {
      if (image.pageNumber < 1 || image.pageNumber > source.pageCount) {
        throw new BadRequestException(
          `Image ${image.index} references page ${image.pageNumber} outside 1-${source.pageCount}`,
        );
      }
    }

    const { confidence } = source.classification;
    if (!(confidence >= 0 && confidence <= 1)) {
      throw new BadRequestException('Confidence must be between 0 and 1');
    }
  }

  private isArtifactOf(markdown: string, summary: DocumentSummary): boolean {
    const { processedAt } = summary;
    if (!processedAt) {
      return false;
    }
    const header = parseSummaryMarkdown(markdown);
    return (
      header.documentName === summary.documentName &&
      header.processedAt === processedAt.toISOString()
    );
  }

  private async getSummaryOrThrow(id: string): Promise<DocumentSummary> {
    const summary = await this.summaryRepository.findById(id);
    if (!summary) {
      throw new NotFoundException(`Summary ${id} not found`);
    }
    return summary;
  }

  private async getSummarizedOrThrow(id: string): Promise<DocumentSummary> {
    const summary = await this.getSummaryOrThrow(id);
    if (summary.status !== SummaryStatus.SUMMARIZED) {
      throw new ConflictException(
        `Summary ${id} has no generated output (status: ${summary.status})`,
      );
    }
    return summary;
  }

  private maxImages(): number {
    return this.configService.getOrThrow('summaries.maxImagesInSummary', {
      infer: true,
    });
  }

  private logAccess(summary: DocumentSummary, resource: string): void {
    this.auditService.logDocumentEvent({
      event: DocumentEventType.SUMMARY_ACCESSED,
      summaryId: summary.id,
      documentKey: summary.documentKey,
      documentType: summary.documentType,
      success: true,
      metadata: { resource },
    });
  }
}
