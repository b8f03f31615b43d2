import { DocumentType } from '../enums/document-type.enum';
import { ImageClassification } from '../enums/image-classification.enum';
import { SummaryStatus } from '../enums/summary-status.enum';
import {
  ChapterHeading,
  ClinicalTimeline,
  Diagnostics,
  ExtractedData,
  KeyConcept,
  PatientDemographics,
} from './extracted-data.entity';

export interface ExtractedImage {
  pageNumber: number;
  index: number;
  captionText: string;
  classificationTag: ImageClassification;
}

export interface DocumentSummary {
  id: string;
  documentKey: string; // md5(file stem), 12 hex chars
  documentName: string;

  // Classification (scored upstream)
  documentType: DocumentType;
  confidence: number; // Fraction 0-1
  status: SummaryStatus;
  pageCount: number;

  // Summary fields (PHI - never log)
  demographics?: PatientDemographics | null;
  timeline?: ClinicalTimeline | null;
  diagnostics?: Diagnostics | null;
  chapterStructure?: ChapterHeading[] | null;
  keyConcepts?: KeyConcept[] | null;
  extractedImages: ExtractedImage[];
  extractedData?: ExtractedData | null;
  sourceText: string;

  // Artifacts
  chunkCount: number;
  artifactFolder: string; // {documentType}_{fileStem}
  markdownPath?: string | null;

  errorMessage?: string | null; // Sanitized
  processedAt?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewDocumentSummary = Omit<
  DocumentSummary,
  'id' | 'createdAt' | 'updatedAt'
>;
