/**
 * Type-specific extraction results.
 *
 * `strategy` names the extractor that produced the data. Research articles,
 * radiology reports and unknown documents are read with the case report
 * extractor, so their data carries `strategy: 'case_report'`.
 */

export type ExtractionStrategy =
  | 'case_report'
  | 'textbook'
  | 'guideline'
  | 'discharge_summary'
  | 'lab_report';

export interface PatientDemographics {
  age?: number;
  gender?: string;
}

export interface ClinicalTimeline {
  onsetDays?: number; // "N days prior/before/ago"
  illnessDay?: number; // "day N of admission/illness"
  durationDays?: number; // "after/following N days"
}

export type LabTrend = 'decreasing' | 'stable';

export interface LabSeries {
  values: number[];
  trend?: LabTrend;
}

export interface Diagnostics {
  primaryDiagnosis?: string;
  platelets?: LabSeries;
  wbc?: LabSeries;
}

export interface Medication {
  name: string;
  dose: string;
  unit: string;
}

export interface CaseReportExtraction {
  strategy: 'case_report';
  patient: PatientDemographics;
  clinicalFindings: { chiefComplaint?: string };
  timeline: ClinicalTimeline;
  diagnostics: Diagnostics;
  interventions: { medications: Medication[] };
  outcome: { status?: string };
}

export interface ChapterHeading {
  number: number;
  title: string;
}

export interface DiseaseEntity {
  name: string;
  definition: string;
}

export type KeyConceptType = 'diagnostic_criteria' | 'key_point';

export interface KeyConcept {
  type: KeyConceptType;
  content: string;
}

export interface TextbookExtraction {
  strategy: 'textbook';
  chapters: ChapterHeading[];
  diseases: DiseaseEntity[];
  treatments: string[];
  keyConcepts: KeyConcept[];
}

export interface Recommendation {
  text: string;
  evidenceLevel?: string;
  strength?: string;
}

export interface GuidelineExtraction {
  strategy: 'guideline';
  recommendations: Recommendation[];
  contraindications: string[];
  monitoring: string[];
}

export interface EncounterDetails {
  date?: string;
  diagnosis?: string;
}

export interface DischargeSummaryExtraction {
  strategy: 'discharge_summary';
  admission: EncounterDetails;
  discharge: EncounterDetails;
  hospitalCourse?: string;
  dischargeMedications: Medication[];
  followUp: string[];
}

export type LabFlag = 'H' | 'L' | '*' | 'abnormal' | 'critical';

export interface LabTest {
  name: string;
  value: string;
  unit: string;
  reference: string;
  flag?: LabFlag;
}

export interface LabReportExtraction {
  strategy: 'lab_report';
  tests: LabTest[];
  abnormalValues: LabTest[];
  criticalValues: LabTest[];
}

export type ExtractedData =
  | CaseReportExtraction
  | TextbookExtraction
  | GuidelineExtraction
  | DischargeSummaryExtraction
  | LabReportExtraction;
