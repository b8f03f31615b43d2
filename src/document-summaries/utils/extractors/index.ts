import { DocumentType } from '../../domain/enums/document-type.enum';
import {
  ChapterHeading,
  ClinicalTimeline,
  Diagnostics,
  ExtractedData,
  ExtractionStrategy,
  KeyConcept,
  PatientDemographics,
} from '../../domain/entities/extracted-data.entity';
import { extractCaseReport } from './case-report.extractor';
import { extractDischargeSummary } from './discharge-summary.extractor';
import { extractGuideline } from './guideline.extractor';
import { extractLabReport } from './lab-report.extractor';
import { extractTextbook } from './textbook.extractor';

const EXTRACTORS: Record<ExtractionStrategy, (text: string) => ExtractedData> =
  {
    case_report: extractCaseReport,
    textbook: extractTextbook,
    guideline: extractGuideline,
    discharge_summary: extractDischargeSummary,
    lab_report: extractLabReport,
  };

export function strategyForType(documentType: DocumentType): ExtractionStrategy {
  switch (documentType) {
    case DocumentType.TEXTBOOK:
      return 'textbook';
    case DocumentType.GUIDELINE:
      return 'guideline';
    case DocumentType.DISCHARGE_SUMMARY:
      return 'discharge_summary';
    case DocumentType.LAB_REPORT:
      return 'lab_report';
    case DocumentType.CASE_REPORT:
    case DocumentType.RESEARCH_ARTICLE:
    case DocumentType.RADIOLOGY_REPORT:
    case DocumentType.UNKNOWN:
      return 'case_report';
  }
}

export function extractDocumentData(
  documentType: DocumentType,
  text: string,
): ExtractedData {
  return EXTRACTORS[strategyForType(documentType)](text);
}

/**
 * Number of populated top-level fields, for extraction reports
 */
export function countExtractedFields(data: ExtractedData): number {
  return Object.entries(data).filter(([key, value]) => {
    if (key === 'strategy' || value === undefined || value === null) {
      return false;
    }
    if (Array.isArray(value)) {
      return value.length > 0;
    }
    if (typeof value === 'object') {
      return Object.keys(value).some((field) => {
        const nested: unknown = Reflect.get(value, field);
        return Array.isArray(nested) ? nested.length > 0 : nested !== undefined;
      });
    }
    return String(value).length > 0;
  }).length;
}

export { formatMedication } from './medication.util';

export interface SummaryFields {
  demographics: PatientDemographics | null;
  timeline: ClinicalTimeline | null;
  diagnostics: Diagnostics | null;
  chapterStructure: ChapterHeading[] | null;
  keyConcepts: KeyConcept[] | null;
}

function nonEmpty<T extends object>(value: T): T | null {
  return Object.keys(value).length > 0 ? value : null;
}

/**
 * Summary-level fields lifted out of the type-specific extraction.
 * Fields a strategy does not produce are null so re-processing clears them.
 */
export function summaryFieldsFrom(data: ExtractedData): SummaryFields {
  const fields: SummaryFields = {
    demographics: null,
    timeline: null,
    diagnostics: null,
    chapterStructure: null,
    keyConcepts: null,
  };

  switch (data.strategy) {
    case 'case_report':
      fields.demographics = nonEmpty(data.patient);
      fields.timeline = nonEmpty(data.timeline);
      fields.diagnostics = nonEmpty(data.diagnostics);
      break;
    case 'textbook':
      fields.chapterStructure = data.chapters.length ? data.chapters : null;
      fields.keyConcepts = data.keyConcepts.length ? data.keyConcepts : null;
      break;
    case 'discharge_summary':
      fields.diagnostics = data.discharge.diagnosis
        ? { primaryDiagnosis: data.discharge.diagnosis }
        : null;
      break;
    case 'guideline':
    case 'lab_report':
      break;
  }

  return fields;
}
