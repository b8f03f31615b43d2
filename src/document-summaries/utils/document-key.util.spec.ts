import { createHash } from 'crypto';
import { DocumentType } from '../domain/enums/document-type.enum';
import {
  artifactFolderFor,
  buildDocumentKey,
  fileStem,
  safeFileStem,
  summaryArtifactPaths,
} from './document-key.util';

describe('document key utilities', () => {
  it('should derive the key from the md5 of the file stem', () => {
    const expected = createHash('md5')
      .update('dengue_case')
      .digest('hex')
      .substring(0, 12);

    expect(buildDocumentKey('dengue_case.pdf')).toBe(expected);
    expect(buildDocumentKey('dengue_case.pdf')).toMatch(/^[0-9a-f]{12}$/);
  });

  it('should strip directories and extension from the stem', () => {
    expect(fileStem('uploads/dengue_case.pdf')).toBe('dengue_case');
  });

  it('should make stems safe for storage paths', () => {
    expect(safeFileStem('../Dengue Case (2).pdf')).toBe('Dengue_Case_2_');
    expect(safeFileStem('___.pdf')).toBe('document');
  });

  it('should name the artifact folder and files', () => {
    const folder = artifactFolderFor(DocumentType.TEXTBOOK, 'tropical med.pdf');

    expect(folder).toBe('textbook_tropical_med');
    expect(summaryArtifactPaths(folder, 'tropical med.pdf')).toEqual({
      markdown: 'textbook_tropical_med/tropical_med_summary.md',
      vectorDb: 'textbook_tropical_med/tropical_med_vector_db.json',
      extractionReport: 'textbook_tropical_med/extraction_report.json',
    });
  });
});
