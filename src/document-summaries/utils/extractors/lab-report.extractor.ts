import {
  LabFlag,
  LabReportExtraction,
  LabTest,
} from '../../domain/entities/extracted-data.entity';

/**
 * Lab Report Extractor
 *
 * One test per line: `Name: value [unit] [(low-high)] [flag]`.
 * Example: Platelets: 45 x10^9/L (150-400) L
 *
 * HIPAA Compliance: values are PHI. Log counts only.
 */

const LAB_LINE_PATTERN = /^\s*([A-Za-z][A-Za-z0-9 ()-]*?)\s*:\s*(\d+(?:\.\d+)?)(.*)$/;
const UNIT_PATTERN = /^([A-Za-z%µ][^\s()]*)/;
const REFERENCE_PATTERN =
  /\(?\s*(?:ref(?:erence)?(?:\s+range)?\s*:?\s*)?(\d+(?:\.\d+)?)\s*-\s*(\d+(?:\.\d+)?)\s*\)?/i;
const FLAG_PATTERN = /(?:^|\s)(H|L|\*|abnormal|critical)(?=\s|$)/i;
const FLAG_TOKEN_PATTERN = /^(?:H|L|\*|abnormal|critical)$/i;
const CRITICAL_PATTERN = /\bcritical\b/i;

function normalizeFlag(raw: string): LabFlag {
  const lower = raw.toLowerCase();
  if (lower === 'abnormal' || lower === 'critical') {
    return lower;
  }
  if (lower === 'h') {
    return 'H';
  }
  if (lower === 'l') {
    return 'L';
  }
  return '*';
}

export function parseLabLine(line: string): LabTest | null {
  const match = LAB_LINE_PATTERN.exec(line);
  if (!match) {
    return null;
  }

  const name = match[1].trim();
  let rest = match[3].trim();

  // Dates and times ("Collected: 2026-03-01") are not results
  if (name.length < 2 || name.length > 60 || /^[-/:]\d/.test(rest)) {
    return null;
  }

  let unit = '';
  const unitMatch = UNIT_PATTERN.exec(rest);
  if (unitMatch && !FLAG_TOKEN_PATTERN.test(unitMatch[1])) {
    unit = unitMatch[1];
    rest = rest.slice(unitMatch[0].length).trim();
  }

  let reference = '';
  const referenceMatch = REFERENCE_PATTERN.exec(rest);
  if (referenceMatch) {
    reference = `${referenceMatch[1]}-${referenceMatch[2]}`;
    rest = (
      rest.slice(0, referenceMatch.index) +
      ' ' +
      rest.slice(referenceMatch.index + referenceMatch[0].length)
    ).trim();
  }

  const test: LabTest = { name, value: match[2], unit, reference };
  // critical outranks any H/L/* flag on the same line
  if (CRITICAL_PATTERN.test(rest)) {
    test.flag = 'critical';
  } else {
    const flagMatch = FLAG_PATTERN.exec(rest);
    if (flagMatch) {
      test.flag = normalizeFlag(flagMatch[1]);
    }
  }
  return test;
}

export function extractLabReport(text: string): LabReportExtraction {
  const tests = text
    .split(/\r?\n/)
    .map(parseLabLine)
    .filter((test): test is LabTest => test !== null);

  return {
    strategy: 'lab_report',
    tests,
    abnormalValues: tests.filter((test) => test.flag !== undefined),
    criticalValues: tests.filter((test) => test.flag === 'critical'),
  };
}
