import {
  DocumentSummary,
  NewDocumentSummary,
} from '../../../../domain/entities/document-summary.entity';
import { DocumentSummaryEntity } from '../entities/document-summary.entity';

export class DocumentSummaryMapper {
  static toDomain(entity: DocumentSummaryEntity): DocumentSummary {
    return {
      id: entity.id,
      documentKey: entity.documentKey,
      documentName: entity.documentName,
      documentType: entity.documentType,
      confidence: entity.confidence,
      status: entity.status,
      pageCount: entity.pageCount,
      demographics: entity.demographics,
      timeline: entity.timeline,
      diagnostics: entity.diagnostics,
      chapterStructure: entity.chapterStructure,
      keyConcepts: entity.keyConcepts,
      extractedImages: entity.extractedImages ?? [],
      extractedData: entity.extractedData,
      sourceText: entity.sourceText,
      chunkCount: entity.chunkCount,
      artifactFolder: entity.artifactFolder,
      markdownPath: entity.markdownPath,
      errorMessage: entity.errorMessage,
      processedAt: entity.processedAt,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }

  static toPersistence(domain: NewDocumentSummary): DocumentSummaryEntity {
    const entity = new DocumentSummaryEntity();
    entity.documentKey = domain.documentKey;
    entity.documentName = domain.documentName;
    entity.documentType = domain.documentType;
    entity.confidence = domain.confidence;
    entity.status = domain.status;
    entity.pageCount = domain.pageCount;
    entity.demographics = domain.demographics ?? null;
    entity.timeline = domain.timeline ?? null;
    entity.diagnostics = domain.diagnostics ?? null;
    entity.chapterStructure = domain.chapterStructure ?? null;
    entity.keyConcepts = domain.keyConcepts ?? null;
    entity.extractedImages = domain.extractedImages;
    entity.extractedData = domain.extractedData ?? null;
    entity.sourceText = domain.sourceText;
    entity.chunkCount = domain.chunkCount;
    entity.artifactFolder = domain.artifactFolder;
    entity.markdownPath = domain.markdownPath ?? null;
    entity.errorMessage = domain.errorMessage ?? null;
    entity.processedAt = domain.processedAt ?? null;
    return entity;
  }
}
