import {
  CaseReportExtraction,
  LabSeries,
} from '../../domain/entities/extracted-data.entity';
import { extractMedications } from './medication.util';
import { allMatches, firstCapture, firstInteger } from './pattern.util';

/**
 * Case Report Extractor
 *
 * Pulls patient demographics, timeline, lab series, diagnosis, medications
 * and outcome out of narrative case text. Also the fallback extractor for
 * research articles, radiology reports and unclassified documents.
 *
 * HIPAA Compliance: output is PHI. Never log it, only counts.
 */

const AGE_PATTERN = /\b(\d{1,3})[\s-]*years?[\s-]*old\b/i;
const GENDER_PATTERN = /\b(male|female|man|woman)\b/i;
const CHIEF_COMPLAINT_PATTERN = /presented\s+with\s+([^.]{10,100})/i;

const ONSET_PATTERN = /(\d+)\s*days?\s+(?:prior|before|ago)/i;
const ILLNESS_DAY_PATTERN = /day\s+(\d+)\s+of\s+(?:admission|illness)/i;
const DURATION_PATTERN = /(?:after|following)\s+(\d+)\s*days?/i;

const PLATELET_PATTERN =
  /platelets?(?:\s+count)?\s*(?:of\s+)?[:=]?\s*(\d[\d,]*)/gi;
const WBC_PATTERN =
  /(?:WBC|white\s+blood\s+cells?)(?:\s+count)?\s*(?:of\s+)?[:=]?\s*(\d[\d,]*)/gi;

const DIAGNOSIS_PATTERNS = [
  /(?:final\s+)?diagnosis\s*:?\s*([^.]+)/i,
  /diagnosed\s+with\s+([^.]+)/i,
  /consistent\s+with\s+([^.]+)/i,
];

const OUTCOME_PATTERNS = [
  /\b(recovered|died|discharged|transferred)\b/i,
  /\b(complete\s+recovery|partial\s+recovery|death)\b/i,
  /\b(favorable\s+outcome|poor\s+outcome)\b/i,
];

function numericSeries(
  text: string,
  pattern: RegExp,
  min: number,
  max: number,
): number[] {
  return allMatches(text, pattern)
    .map((match) => parseInt(match[1].replace(/,/g, ''), 10))
    .filter((value) => !Number.isNaN(value) && value >= min && value <= max);
}

/**
 * Trend is "decreasing" when the last reading is below the first
 */
export function labSeries(values: number[]): LabSeries | undefined {
  if (values.length === 0) {
    return undefined;
  }
  return {
    values,
    trend:
      values.length > 1 && values[values.length - 1] < values[0]
        ? 'decreasing'
        : 'stable',
  };
}

export function extractCaseReport(text: string): CaseReportExtraction {
  const data: CaseReportExtraction = {
    strategy: 'case_report',
    patient: {},
    clinicalFindings: {},
    timeline: {},
    diagnostics: {},
    interventions: { medications: extractMedications(text) },
    outcome: {},
  };

  // Demographics
  const age = firstInteger(text, AGE_PATTERN);
  if (age !== undefined) {
    data.patient.age = age;
  }
  const gender = firstCapture(text, [GENDER_PATTERN]);
  if (gender) {
    data.patient.gender = gender.toLowerCase();
  }

  const chiefComplaint = firstCapture(text, [CHIEF_COMPLAINT_PATTERN]);
  if (chiefComplaint) {
    data.clinicalFindings.chiefComplaint = chiefComplaint;
  }

  // Timeline
  const onsetDays = firstInteger(text, ONSET_PATTERN);
  if (onsetDays !== undefined) {
    data.timeline.onsetDays = onsetDays;
  }
  const illnessDay = firstInteger(text, ILLNESS_DAY_PATTERN);
  if (illnessDay !== undefined) {
    data.timeline.illnessDay = illnessDay;
  }
  const durationDays = firstInteger(text, DURATION_PATTERN);
  if (durationDays !== undefined) {
    data.timeline.durationDays = durationDays;
  }

  // Lab series
  const platelets = labSeries(
    numericSeries(text, PLATELET_PATTERN, 1_000, 1_000_000),
  );
  if (platelets) {
    data.diagnostics.platelets = platelets;
  }
  const wbcValues = numericSeries(text, WBC_PATTERN, 100, 100_000);
  if (wbcValues.length > 0) {
    data.diagnostics.wbc = { values: wbcValues };
  }

  const primaryDiagnosis = firstCapture(text, DIAGNOSIS_PATTERNS);
  if (primaryDiagnosis) {
    data.diagnostics.primaryDiagnosis = primaryDiagnosis;
  }

  const outcome = firstCapture(text, OUTCOME_PATTERNS);
  if (outcome) {
    data.outcome.status = outcome.toLowerCase();
  }

  return data;
}
