import { DocumentType } from '../domain/enums/document-type.enum';
import { DocumentSummary } from '../domain/entities/document-summary.entity';
import { ExtractedData } from '../domain/entities/extracted-data.entity';
import { VectorChunk, buildImageChunks, buildTextChunks } from './text-chunker';

export interface VectorDocumentMetadata {
  documentKey: string;
  fileName: string;
  documentType: DocumentType;
  typeConfidence: number;
  pages: number;
  processedDate: string;
  hasImages: boolean;
  imageCount: number;
}

/**
 * Contents of {stem}_vector_db.json, ready for embedding and indexing
 */
export interface VectorPayload {
  documentId: string;
  documentType: DocumentType;
  typeConfidence: number;
  documentMetadata: VectorDocumentMetadata;
  extractedData: ExtractedData | null;
  textChunks: VectorChunk[];
  imageChunks: VectorChunk[];
  totalChunks: number;
}

type PayloadSource = Pick<
  DocumentSummary,
  | 'documentKey'
  | 'documentName'
  | 'documentType'
  | 'confidence'
  | 'pageCount'
  | 'extractedImages'
  | 'sourceText'
> & {
  processedAt: Date;
  extractedData?: ExtractedData | null;
};

export function buildVectorPayload(source: PayloadSource): VectorPayload {
  const textChunks = buildTextChunks(
    source.documentKey,
    source.documentType,
    source.sourceText,
  );
  const imageChunks = buildImageChunks(
    source.documentKey,
    source.documentType,
    source.extractedImages,
  );

  return {
    documentId: source.documentKey,
    documentType: source.documentType,
    typeConfidence: source.confidence,
    documentMetadata: {
      documentKey: source.documentKey,
      fileName: source.documentName,
      documentType: source.documentType,
      typeConfidence: source.confidence,
      pages: source.pageCount,
      processedDate: source.processedAt.toISOString(),
      hasImages: source.extractedImages.length > 0,
      imageCount: source.extractedImages.length,
    },
    extractedData: source.extractedData ?? null,
    textChunks,
    imageChunks,
    totalChunks: textChunks.length + imageChunks.length,
  };
}
