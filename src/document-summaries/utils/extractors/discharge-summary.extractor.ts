import {
  DischargeSummaryExtraction,
  EncounterDetails,
} from '../../domain/entities/extracted-data.entity';
import { extractListedMedications } from './medication.util';
import { allCaptures, firstCapture } from './pattern.util';

const ADMISSION_DATE_PATTERN =
  /(?:admission\s+date|date\s+of\s+admission)[:\s]+([^\n]+)/i;
const DISCHARGE_DATE_PATTERN =
  /(?:discharge\s+date|date\s+of\s+discharge)[:\s]+([^\n]+)/i;
const ADMISSION_DIAGNOSIS_PATTERN = /admission\s+diagnosis[:\s]+([^\n]+)/i;
const DISCHARGE_DIAGNOSIS_PATTERN = /discharge\s+diagnosis[:\s]+([^\n]+)/i;

const HOSPITAL_COURSE_PATTERN = /hospital\s+course[:\s]+([^.]{50,1000})/i;
// Section runs to the next blank line or the end of the text
const MEDICATION_SECTION_PATTERN =
  /discharge\s+medications?[:\s]+([\s\S]*?)(?:\n\s*\n|$)/i;
const FOLLOW_UP_PATTERN = /follow[\s-]up[:\s]+([^.]{20,500})/gi;

function encounter(
  text: string,
  datePattern: RegExp,
  diagnosisPattern: RegExp,
): EncounterDetails {
  const details: EncounterDetails = {};
  const date = firstCapture(text, [datePattern]);
  if (date) {
    details.date = date;
  }
  const diagnosis = firstCapture(text, [diagnosisPattern]);
  if (diagnosis) {
    details.diagnosis = diagnosis;
  }
  return details;
}

/**
 * Discharge Summary Extractor
 */
export function extractDischargeSummary(
  text: string,
): DischargeSummaryExtraction {
  const data: DischargeSummaryExtraction = {
    strategy: 'discharge_summary',
    admission: encounter(
      text,
      ADMISSION_DATE_PATTERN,
      ADMISSION_DIAGNOSIS_PATTERN,
    ),
    discharge: encounter(
      text,
      DISCHARGE_DATE_PATTERN,
      DISCHARGE_DIAGNOSIS_PATTERN,
    ),
    dischargeMedications: [],
    followUp: allCaptures(text, [FOLLOW_UP_PATTERN]),
  };

  const hospitalCourse = firstCapture(text, [HOSPITAL_COURSE_PATTERN]);
  if (hospitalCourse) {
    data.hospitalCourse = hospitalCourse;
  }

  const medicationSection = firstCapture(text, [MEDICATION_SECTION_PATTERN]);
  if (medicationSection) {
    data.dischargeMedications = extractListedMedications(medicationSection);
  }

  return data;
}
