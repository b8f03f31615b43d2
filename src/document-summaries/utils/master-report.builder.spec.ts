import { DocumentType } from '../domain/enums/document-type.enum';
import { buildMasterReport } from './master-report.builder';

describe('buildMasterReport', () => {
  const generatedAt = new Date('2026-03-06T10:15:30.000Z');

  it('should render statistics, per-type files and failures', () => {
    const report = buildMasterReport({
      generatedAt,
      outputLocation: '/data/summaries',
      documents: [
        {
          file: 'dengue_case.pdf',
          type: DocumentType.CASE_REPORT,
          confidence: 0.87,
          folder: 'case_report_dengue_case',
          chunks: 4,
        },
        {
          file: 'tropical.pdf',
          type: DocumentType.TEXTBOOK,
          confidence: 0.9,
          folder: 'textbook_tropical',
          chunks: 12,
        },
        {
          file: 'malaria_case.pdf',
          type: DocumentType.CASE_REPORT,
          confidence: 0.8,
          folder: 'case_report_malaria_case',
          chunks: 3,
        },
      ],
      failed: [{ file: 'broken.pdf', error: 'No extractable text' }],
    });

    expect(report.markdown).toBe(
      [
        '# Clinical Document Processing Report',
        '',
        '**Generated:** 2026-03-06 10:15:30',
        '**Output Directory:** `/data/summaries`',
        '',
        '## 📊 Summary Statistics',
        '',
        '- **Total Files Processed:** 3',
        '- **Failed Files:** 1',
        '',
        '### Document Type Distribution',
        '',
        '- **Case Report:** 2 files',
        '- **Textbook:** 1 file',
        '',
        '## Case Report Files',
        '',
        '### 📄 dengue_case.pdf',
        '- **Confidence:** 87%',
        '- **Chunks:** 4',
        '- **Folder:** `case_report_dengue_case`',
        '',
        '### 📄 malaria_case.pdf',
        '- **Confidence:** 80%',
        '- **Chunks:** 3',
        '- **Folder:** `case_report_malaria_case`',
        '',
        '## Textbook Files',
        '',
        '### 📄 tropical.pdf',
        '- **Confidence:** 90%',
        '- **Chunks:** 12',
        '- **Folder:** `textbook_tropical`',
        '',
        '## ❌ Failed Files',
        '',
        '- **broken.pdf:** No extractable text',
        '',
      ].join('\n'),
    );
  });

  it('should build the document index', () => {
    const report = buildMasterReport({
      generatedAt,
      outputLocation: '/data/summaries',
      documents: [
        {
          file: 'labs.pdf',
          type: DocumentType.LAB_REPORT,
          confidence: 1,
          folder: 'lab_report_labs',
          chunks: 1,
        },
      ],
      failed: [],
    });

    expect(report.index).toEqual({
      processingDate: '2026-03-06T10:15:30.000Z',
      statistics: {
        totalProcessed: 1,
        byType: { lab_report: 1 },
        totalFailed: 0,
      },
      documents: [
        {
          file: 'labs.pdf',
          type: DocumentType.LAB_REPORT,
          confidence: 1,
          folder: 'lab_report_labs',
          chunks: 1,
        },
      ],
      failed: [],
    });
    expect(report.markdown).not.toContain('Failed Files\n');
  });

  it('should truncate failure messages to 100 characters', () => {
    const report = buildMasterReport({
      generatedAt,
      outputLocation: '/out',
      documents: [],
      failed: [{ file: 'big.pdf', error: 'e'.repeat(150) }],
    });

    expect(report.markdown).toContain(`- **big.pdf:** ${'e'.repeat(100)}\n`);
    expect(report.markdown).not.toContain('Document Type Distribution');
  });
});
