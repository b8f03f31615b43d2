import { DocumentType } from '../domain/enums/document-type.enum';
import { ExtractedImage } from '../domain/entities/document-summary.entity';
import {
  CaseReportExtraction,
  DischargeSummaryExtraction,
  EncounterDetails,
  ExtractedData,
  GuidelineExtraction,
  LabReportExtraction,
  LabTest,
  TextbookExtraction,
} from '../domain/entities/extracted-data.entity';
import { formatMedication } from './extractors';
import { collapseWhitespace } from './extractors/pattern.util';

export const IMAGES_HEADING = '🖼️ Extracted Images';
export const CRITICAL_VALUES_HEADING = '⚠️ Critical Values';

export interface SummaryMarkdownInput {
  documentName: string;
  documentType: DocumentType;
  confidence: number; // Fraction 0-1
  processedAt: Date;
  extractedData?: ExtractedData | null;
  extractedImages: ExtractedImage[];
}

export interface RenderOptions {
  maxImages: number;
}

interface Section {
  heading: string;
  lines: string[];
}

export function titleCase(value: string): string {
  return value
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function formatConfidence(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

function field(label: string, value: string | number | undefined): string[] {
  return value === undefined || value === '' ? [] : [`- **${label}:** ${value}`];
}

function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? `${value.slice(0, maxLength)}...` : value;
}

function caseReportSections(data: CaseReportExtraction): Section[] {
  const { platelets, wbc } = data.diagnostics;
  return [
    {
      heading: 'Patient Demographics',
      lines: [
        ...field('Age', data.patient.age),
        ...field('Gender', data.patient.gender),
      ],
    },
    {
      heading: 'Timeline',
      lines: [
        ...field('Onset Days', data.timeline.onsetDays),
        ...field('Illness Day', data.timeline.illnessDay),
        ...field('Duration Days', data.timeline.durationDays),
      ],
    },
    {
      heading: 'Clinical Findings',
      lines: field('Chief Complaint', data.clinicalFindings.chiefComplaint),
    },
    {
      heading: 'Diagnostics',
      lines: [
        ...field('Primary Diagnosis', data.diagnostics.primaryDiagnosis),
        ...field(
          'Platelets',
          platelets &&
            `${platelets.values.join(', ')}${platelets.trend ? ` (${platelets.trend})` : ''}`,
        ),
        ...field('WBC', wbc && wbc.values.join(', ')),
      ],
    },
    {
      heading: 'Interventions',
      lines: data.interventions.medications.map(
        (medication) => `- ${formatMedication(medication)}`,
      ),
    },
    { heading: 'Outcome', lines: field('Status', data.outcome.status) },
  ];
}

function textbookSections(data: TextbookExtraction): Section[] {
  const diseaseLines: string[] = [];
  data.diseases.slice(0, 5).forEach((disease, index) => {
    if (index > 0) {
      diseaseLines.push('');
    }
    diseaseLines.push(`### ${disease.name}`, disease.definition);
  });

  return [
    {
      heading: 'Chapter Structure',
      lines: data.chapters
        .slice(0, 10)
        .map((chapter) => `- Chapter ${chapter.number}: ${chapter.title}`),
    },
    { heading: 'Disease Entities', lines: diseaseLines },
    {
      heading: 'Key Concepts',
      lines: data.keyConcepts
        .slice(0, 5)
        .map(
          (concept) => `- **${concept.type}:** ${truncate(concept.content, 200)}`,
        ),
    },
  ];
}

function guidelineSections(data: GuidelineExtraction): Section[] {
  return [
    {
      heading: 'Recommendations',
      lines: data.recommendations
        .slice(0, 10)
        .map((recommendation) =>
          recommendation.evidenceLevel
            ? `- [${recommendation.evidenceLevel}] ${recommendation.text}`
            : `- ${recommendation.text}`,
        ),
    },
    {
      heading: 'Contraindications',
      lines: data.contraindications.slice(0, 5).map((item) => `- ${item}`),
    },
    {
      heading: 'Monitoring',
      lines: data.monitoring.slice(0, 5).map((item) => `- ${item}`),
    },
  ];
}

function encounterLines(details: EncounterDetails): string[] {
  return [
    ...field('Date', details.date),
    ...field('Diagnosis', details.diagnosis),
  ];
}

function dischargeSections(data: DischargeSummaryExtraction): Section[] {
  return [
    { heading: 'Admission', lines: encounterLines(data.admission) },
    { heading: 'Discharge', lines: encounterLines(data.discharge) },
    {
      heading: 'Hospital Course',
      lines: data.hospitalCourse ? [data.hospitalCourse] : [],
    },
    {
      heading: 'Discharge Medications',
      lines: data.dischargeMedications
        .slice(0, 10)
        .map((medication) => `- ${formatMedication(medication)}`),
    },
    {
      heading: 'Follow-up',
      lines: data.followUp.map((item) => `- ${item}`),
    },
  ];
}

function labLine(test: LabTest): string {
  const value = test.unit ? `${test.value} ${test.unit}` : test.value;
  return `- **${test.name}:** ${value}${test.flag ? ` [${test.flag}]` : ''}`;
}

function labSections(data: LabReportExtraction): Section[] {
  return [
    {
      heading: 'Abnormal Values',
      lines: data.abnormalValues.slice(0, 10).map(labLine),
    },
    {
      heading: CRITICAL_VALUES_HEADING,
      lines: data.criticalValues.map(labLine),
    },
  ];
}

function typeSections(data: ExtractedData): Section[] {
  switch (data.strategy) {
    case 'case_report':
      return caseReportSections(data);
    case 'textbook':
      return textbookSections(data);
    case 'guideline':
      return guidelineSections(data);
    case 'discharge_summary':
      return dischargeSections(data);
    case 'lab_report':
      return labSections(data);
  }
}

function imageSection(images: ExtractedImage[], maxImages: number): Section {
  return {
    heading: IMAGES_HEADING,
    lines: images
      .slice(0, maxImages)
      .map(
        (image) =>
          `- **Image ${image.index}** (Page ${image.pageNumber}): ${collapseWhitespace(image.captionText) || 'No caption'} [${image.classificationTag}]`,
      ),
  };
}

/**
 * Render a document summary as Markdown.
 *
 * Header lines (Document, Type with confidence, Processed) are always
 * present; sections without content are omitted.
 */
export function renderSummaryMarkdown(
  input: SummaryMarkdownInput,
  options: RenderOptions,
): string {
  const lines = [
    `# ${titleCase(input.documentType)} Summary`,
    '',
    `**Document:** ${collapseWhitespace(input.documentName)}`,
    `**Type:** ${input.documentType} (confidence: ${formatConfidence(input.confidence)})`,
    `**Processed:** ${input.processedAt.toISOString()}`,
    '',
  ];

  const sections = [
    ...(input.extractedData ? typeSections(input.extractedData) : []),
    imageSection(input.extractedImages, options.maxImages),
  ];

  for (const section of sections) {
    if (section.lines.length === 0) {
      continue;
    }
    lines.push(`## ${section.heading}`, ...section.lines, '');
  }

  return lines.join('\n');
}
