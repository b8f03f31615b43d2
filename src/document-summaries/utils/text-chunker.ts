import { DocumentType } from '../domain/enums/document-type.enum';
import { ExtractedImage } from '../domain/entities/document-summary.entity';

export interface ChunkingOptions {
  size: number; // Characters
  overlap: number; // Characters carried into the next chunk
}

const DEFAULT_CHUNKING: ChunkingOptions = { size: 512, overlap: 128 };

const CHUNKING_BY_TYPE: Partial<Record<DocumentType, ChunkingOptions>> = {
  [DocumentType.CASE_REPORT]: { size: 512, overlap: 128 },
  [DocumentType.TEXTBOOK]: { size: 768, overlap: 200 },
  [DocumentType.GUIDELINE]: { size: 400, overlap: 100 },
  [DocumentType.LAB_REPORT]: { size: 256, overlap: 50 },
};

export function chunkingFor(documentType: DocumentType): ChunkingOptions {
  return CHUNKING_BY_TYPE[documentType] ?? DEFAULT_CHUNKING;
}

export interface ChunkMetadata {
  documentKey: string;
  documentType: DocumentType;
  chunkIndex: number;
  chunkType: 'text' | 'image';
  pageNumber?: number;
  classificationTag?: string;
}

export interface VectorChunk {
  id: string;
  text: string;
  metadata: ChunkMetadata;
}

/**
 * Sentence-accumulating chunker.
 *
 * Sentences (split on ". ") are appended while the chunk stays under
 * `size`. On overflow the chunk is emitted and the next one starts with the
 * last `overlap` characters of it.
 */
export function chunkText(text: string, options: ChunkingOptions): string[] {
  const chunks: string[] = [];
  const sentences = text.replace(/\r?\n/g, ' ').split('. ');
  let current = '';

  for (const sentence of sentences) {
    const piece = sentence.endsWith('.') ? `${sentence} ` : `${sentence}. `;

    if (current.length + sentence.length < options.size) {
      current += piece;
      continue;
    }

    if (!current) {
      // Oversized sentence becomes a chunk of its own
      current = piece;
      continue;
    }

    chunks.push(current.trim());
    current =
      current.length > options.overlap
        ? current.slice(-options.overlap) + piece
        : piece;
  }

  if (current.trim()) {
    chunks.push(current.trim());
  }

  return chunks;
}

export function buildTextChunks(
  documentKey: string,
  documentType: DocumentType,
  text: string,
): VectorChunk[] {
  return chunkText(text, chunkingFor(documentType)).map((chunk, index) => ({
    id: `${documentKey}_${index}`,
    text: chunk,
    metadata: {
      documentKey,
      documentType,
      chunkIndex: index,
      chunkType: 'text',
    },
  }));
}

export function buildImageChunks(
  documentKey: string,
  documentType: DocumentType,
  images: ExtractedImage[],
): VectorChunk[] {
  return images.map((image) => ({
    id: `${documentKey}_img_${image.index}`,
    text: `Image: ${image.captionText}`,
    metadata: {
      documentKey,
      documentType,
      chunkIndex: image.index,
      chunkType: 'image',
      pageNumber: image.pageNumber,
      classificationTag: image.classificationTag,
    },
  }));
}
