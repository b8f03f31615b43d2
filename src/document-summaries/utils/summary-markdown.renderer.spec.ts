import { DocumentType } from '../domain/enums/document-type.enum';
import { ImageClassification } from '../domain/enums/image-classification.enum';
import {
  formatConfidence,
  renderSummaryMarkdown,
  titleCase,
} from './summary-markdown.renderer';

describe('renderSummaryMarkdown', () => {
  const processedAt = new Date('2026-03-06T10:00:00.000Z');

  it('should render a case report summary', () => {
    const markdown = renderSummaryMarkdown(
      {
        documentName: 'dengue_case.pdf',
        documentType: DocumentType.CASE_REPORT,
        confidence: 0.874,
        processedAt,
        extractedData: {
          strategy: 'case_report',
          patient: { age: 34, gender: 'female' },
          clinicalFindings: {},
          timeline: { onsetDays: 5 },
          diagnostics: {
            primaryDiagnosis: 'dengue fever',
            platelets: { values: [150000, 45000], trend: 'decreasing' },
          },
          interventions: {
            medications: [{ name: 'Paracetamol', dose: '500', unit: 'mg' }],
          },
          outcome: { status: 'recovered' },
        },
        extractedImages: [
          {
            pageNumber: 2,
            index: 1,
            captionText: 'Petechial rash',
            classificationTag: ImageClassification.CLINICAL_FINDING,
          },
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

    expect(markdown).toBe(
      [
        '# Case Report Summary',
        '',
        '**Document:** dengue_case.pdf',
        '**Type:** case_report (confidence: 87%)',
        '**Processed:** 2026-03-06T10:00:00.000Z',
        '',
        '## Patient Demographics',
        '- **Age:** 34',
        '- **Gender:** female',
        '',
        '## Timeline',
        '- **Onset Days:** 5',
        '',
        '## Diagnostics',
        '- **Primary Diagnosis:** dengue fever',
        '- **Platelets:** 150000, 45000 (decreasing)',
        '',
        '## Interventions',
        '- Paracetamol 500 mg',
        '',
        '## Outcome',
        '- **Status:** recovered',
        '',
        '## 🖼️ Extracted Images',
        '- **Image 1** (Page 2): Petechial rash [clinical_finding]',
        '- **Image 2** (Page 3): No caption [data_visualization]',
        '',
      ].join('\n'),
    );
  });

  it('should render textbook sections with truncated key concepts', () => {
    const markdown = renderSummaryMarkdown(
      {
        documentName: 'tropical.pdf',
        documentType: DocumentType.TEXTBOOK,
        confidence: 0.9,
        processedAt,
        extractedData: {
          strategy: 'textbook',
          chapters: [{ number: 1, title: 'Arboviral Infections' }],
          diseases: [
            { name: 'Dengue', definition: 'viral disease' },
            { name: 'Zika', definition: 'flaviviral disease' },
          ],
          treatments: [],
          keyConcepts: [{ type: 'key_point', content: 'a'.repeat(250) }],
        },
        extractedImages: [],
      },
      { maxImages: 10 },
    );

    expect(markdown).toContain(
      [
        '## Chapter Structure',
        '- Chapter 1: Arboviral Infections',
        '',
        '## Disease Entities',
        '### Dengue',
        'viral disease',
        '',
        '### Zika',
        'flaviviral disease',
        '',
        '## Key Concepts',
        `- **key_point:** ${'a'.repeat(200)}...`,
      ].join('\n'),
    );
    expect(markdown).not.toContain('Extracted Images');
  });

  it('should mark guideline recommendations with their evidence level', () => {
    const markdown = renderSummaryMarkdown(
      {
        documentName: 'who.pdf',
        documentType: DocumentType.GUIDELINE,
        confidence: 0.5,
        processedAt,
        extractedData: {
          strategy: 'guideline',
          recommendations: [
            { text: 'give oral fluids', strength: 'should be' },
            { text: 'early resuscitation', evidenceLevel: 'A' },
          ],
          contraindications: [],
          monitoring: [],
        },
        extractedImages: [],
      },
      { maxImages: 10 },
    );

    expect(markdown).toContain(
      '## Recommendations\n- give oral fluids\n- [A] early resuscitation\n',
    );
  });

  it('should list lab critical values under their own heading', () => {
    const critical = {
      name: 'Potassium',
      value: '6.9',
      unit: 'mmol/L',
      reference: '3.5-5.1',
      flag: 'critical' as const,
    };

    const markdown = renderSummaryMarkdown(
      {
        documentName: 'labs.pdf',
        documentType: DocumentType.LAB_REPORT,
        confidence: 1,
        processedAt,
        extractedData: {
          strategy: 'lab_report',
          tests: [critical],
          abnormalValues: [critical],
          criticalValues: [critical],
        },
        extractedImages: [],
      },
      { maxImages: 10 },
    );

    expect(markdown).toContain(
      '## ⚠️ Critical Values\n- **Potassium:** 6.9 mmol/L [critical]\n',
    );
  });

  it('should cap the image list', () => {
    const extractedImages = [1, 2, 3].map((index) => ({
      pageNumber: 1,
      index,
      captionText: `Figure ${index}`,
      classificationTag: ImageClassification.DIAGNOSTIC_IMAGING,
    }));

    const markdown = renderSummaryMarkdown(
      {
        documentName: 'scan.pdf',
        documentType: DocumentType.RADIOLOGY_REPORT,
        confidence: 0.7,
        processedAt,
        extractedImages,
      },
      { maxImages: 2 },
    );

    expect(markdown).toContain('- **Image 2** (Page 1): Figure 2');
    expect(markdown).not.toContain('- **Image 3**');
  });
});

describe('formatting helpers', () => {
  it('should title-case document types', () => {
    expect(titleCase('discharge_summary')).toBe('Discharge Summary');
  });

  it('should round confidence to a whole percentage', () => {
    expect(formatConfidence(0.875)).toBe('88%');
    expect(formatConfidence(0)).toBe('0%');
  });
});
