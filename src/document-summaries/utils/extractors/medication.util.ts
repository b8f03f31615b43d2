import { Medication } from '../../domain/entities/extracted-data.entity';
import { allMatches } from './pattern.util';

// Capitalised word with a common drug-name suffix, then dose and unit
const SUFFIX_MEDICATION_PATTERN =
  /\b([A-Z][a-z]+(?:in|ol|ide|ate|ine|one|am))\s+(\d+(?:\.\d+)?)\s*(mg|g|ml)\b/g;

const COMMON_ANALGESIC_PATTERN =
  /\b(acetaminophen|ibuprofen|aspirin|paracetamol)\s+(\d+(?:\.\d+)?)\s*(mg)\b/gi;

// Any capitalised word followed by dose and unit, used inside medication lists
const LISTED_MEDICATION_PATTERN =
  /\b([A-Z][a-z]+)\s+(\d+(?:\.\d+)?)\s*(mg|g|ml)\b/g;

function collect(text: string, patterns: RegExp[]): Medication[] {
  const medications: Medication[] = [];
  const seen = new Set<string>();

  for (const pattern of patterns) {
    for (const match of allMatches(text, pattern)) {
      const medication: Medication = {
        name: match[1],
        dose: match[2],
        unit: match[3].toLowerCase(),
      };
      const key = `${medication.name.toLowerCase()}|${medication.dose}|${medication.unit}`;
      if (!seen.has(key)) {
        seen.add(key);
        medications.push(medication);
      }
    }
  }

  return medications;
}

/**
 * Medications mentioned in running text
 */
export function extractMedications(text: string): Medication[] {
  return collect(text, [SUFFIX_MEDICATION_PATTERN, COMMON_ANALGESIC_PATTERN]);
}

/**
 * Medications from a dedicated list section (any capitalised name)
 */
export function extractListedMedications(section: string): Medication[] {
  return collect(section, [LISTED_MEDICATION_PATTERN, COMMON_ANALGESIC_PATTERN]);
}

export function formatMedication(medication: Medication): string {
  return `${medication.name} ${medication.dose} ${medication.unit}`;
}
