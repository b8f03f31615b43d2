import { DocumentType } from '../domain/enums/document-type.enum';
import { ImageClassification } from '../domain/enums/image-classification.enum';
import {
  parseSummaryMarkdown,
  validateSummaryMarkdown,
} from './summary-markdown.parser';
import { renderSummaryMarkdown } from './summary-markdown.renderer';

describe('parseSummaryMarkdown', () => {
  const markdown = renderSummaryMarkdown(
    {
      documentName: 'dengue_case.pdf',
      documentType: DocumentType.CASE_REPORT,
      confidence: 0.87,
      processedAt: new Date('2026-03-06T10:00:00.000Z'),
      extractedData: {
        strategy: 'case_report',
        patient: { age: 34 },
        clinicalFindings: {},
        timeline: {},
        diagnostics: { primaryDiagnosis: 'dengue fever' },
        interventions: {
          medications: [{ name: 'Paracetamol', dose: '500', unit: 'mg' }],
        },
        outcome: {},
      },
      extractedImages: [
        {
          pageNumber: 3,
          index: 2,
          captionText: '',
          classificationTag: ImageClassification.DATA_VISUALIZATION,
        },
      ],
    },
    { maxImages: 10 },
  );

  it('should read the header fields', () => {
    const parsed = parseSummaryMarkdown(markdown);

    expect(parsed.title).toBe('Case Report Summary');
    expect(parsed.documentName).toBe('dengue_case.pdf');
    expect(parsed.documentType).toBe('case_report');
    expect(parsed.confidencePercent).toBe(87);
    expect(parsed.processedAt).toBe('2026-03-06T10:00:00.000Z');
  });

  it('should read sections, fields and items', () => {
    const parsed = parseSummaryMarkdown(markdown);

    expect(parsed.sections.map((section) => section.heading)).toEqual([
      'Patient Demographics',
      'Diagnostics',
      'Interventions',
      'Extracted Images',
    ]);
    expect(parsed.sections[1].fields).toEqual({
      'Primary Diagnosis': 'dengue fever',
    });
    expect(parsed.sections[2].items).toEqual(['Paracetamol 500 mg']);
  });

  it('should read images with empty captions', () => {
    expect(parseSummaryMarkdown(markdown).images).toEqual([
      {
        index: 2,
        pageNumber: 3,
        captionText: '',
        classificationTag: 'data_visualization',
      },
    ]);
  });

  it('should read back captions and names that contained line breaks', () => {
    const parsed = parseSummaryMarkdown(
      renderSummaryMarkdown(
        {
          documentName: 'dengue\ncase.pdf',
          documentType: DocumentType.CASE_REPORT,
          confidence: 0.87,
          processedAt: new Date('2026-03-06T10:00:00.000Z'),
          extractedImages: [
            {
              pageNumber: 1,
              index: 0,
              captionText: 'Figure 1\nPetechial rash',
              classificationTag: ImageClassification.CLINICAL_FINDING,
            },
          ],
        },
        { maxImages: 10 },
      ),
    );

    expect(parsed.documentName).toBe('dengue case.pdf');
    expect(parsed.images).toEqual([
      {
        index: 0,
        pageNumber: 1,
        captionText: 'Figure 1 Petechial rash',
        classificationTag: 'clinical_finding',
      },
    ]);
  });

  it('should read subsections with their body', () => {
    const parsed = parseSummaryMarkdown(
      '## Disease Entities\n### Dengue\nviral disease\n\n### Zika\nflaviviral disease\n',
    );

    expect(parsed.sections[0].subsections).toEqual([
      { heading: 'Dengue', body: ['viral disease'] },
      { heading: 'Zika', body: ['flaviviral disease'] },
    ]);
  });
});

describe('validateSummaryMarkdown', () => {
  it('should accept a rendered summary', () => {
    const markdown = renderSummaryMarkdown(
      {
        documentName: 'who.pdf',
        documentType: DocumentType.GUIDELINE,
        confidence: 0.6,
        processedAt: new Date('2026-03-06T10:00:00.000Z'),
        extractedImages: [],
      },
      { maxImages: 10 },
    );

    expect(validateSummaryMarkdown(markdown)).toEqual([]);
  });

  it('should report a missing document, bad confidence and bad timestamp', () => {
    expect(
      validateSummaryMarkdown(
        '# X\n**Type:** case_report (confidence: 140%)\n**Processed:** not-a-date\n',
      ),
    ).toEqual([
      'Missing "Document" field',
      'Confidence 140% is outside 0-100',
      'Unparsable "Processed" timestamp "not-a-date"',
    ]);
  });

  it('should report an unknown type without confidence', () => {
    expect(
      validateSummaryMarkdown(
        '**Document:** a.pdf\n**Type:** memo\n**Processed:** 2026-01-01T00:00:00Z\n',
      ),
    ).toEqual([
      'Unknown document type "memo"',
      'Missing confidence percentage on "Type" field',
    ]);
  });

  it('should report every missing header on empty input', () => {
    expect(validateSummaryMarkdown('')).toEqual([
      'Missing "Document" field',
      'Missing "Type" field',
      'Missing "Processed" field',
    ]);
  });
});
