import { DocumentType } from '../enums/document-type.enum';
import { ImageClassification } from '../enums/image-classification.enum';

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface DocumentClassification {
  documentType: DocumentType;
  confidence: number; // Fraction 0-1, scored upstream
}

export interface SourceImage {
  pageNumber: number;
  index: number;
  captionText?: string;
  classificationTag: ImageClassification;
}

/**
 * Extraction record produced by the upstream PDF/OCR and classification
 * steps. Page text and captions are PHI.
 */
export interface SourceDocument {
  documentName: string;
  pageCount: number;
  pages: PageText[];
  classification: DocumentClassification;
  images?: SourceImage[];
}
