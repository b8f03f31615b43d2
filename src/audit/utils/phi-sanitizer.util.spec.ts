import { sanitizeErrorMessage, sanitizeMetadata } from './phi-sanitizer.util';

describe('phi-sanitizer', () => {
  describe('sanitizeErrorMessage', () => {
    it('should redact file paths', () => {
      expect(
        sanitizeErrorMessage(
          "ENOENT: no such file or directory, open '/data/out/case_report_jane/summary.md'",
        ),
      ).toBe("ENOENT: no such file or directory, open '[PATH_REDACTED]'");
    });

    it('should redact email addresses', () => {
      expect(sanitizeErrorMessage('Upload failed for jane.doe@example.com')).toBe(
        'Upload failed for [EMAIL_REDACTED]',
      );
    });

    it('should redact SSN patterns', () => {
      expect(sanitizeErrorMessage('Record 123-45-6789 rejected')).toBe(
        'Record [SSN_REDACTED] rejected',
      );
    });

    it('should redact name-like word pairs', () => {
      expect(sanitizeErrorMessage('report for John Smith')).toBe(
        'report for [NAME_REDACTED]',
      );
    });

    it('should keep unit strings that are not paths', () => {
      expect(sanitizeErrorMessage('value 4.2 mg/dL out of range')).toBe(
        'value 4.2 mg/dL out of range',
      );
    });

    it('should truncate long messages', () => {
      expect(sanitizeErrorMessage('x'.repeat(600))).toHaveLength(500);
      expect(sanitizeErrorMessage('x'.repeat(600), 100)).toHaveLength(100);
    });

    it('should return an empty string for empty input', () => {
      expect(sanitizeErrorMessage('')).toBe('');
    });
  });

  describe('sanitizeMetadata', () => {
    it('should drop PHI keys and contact details recursively', () => {
      expect(
        sanitizeMetadata({
          summaryId: 's-1',
          documentName: 'jane_doe.pdf',
          counts: { chunks: 3, text: 'fever for 3 days' },
          contact: 'a@b.co',
          images: [{ pageNumber: 2, captionText: 'petechial rash' }],
        }),
      ).toEqual({
        summaryId: 's-1',
        counts: { chunks: 3 },
        images: [{ pageNumber: 2 }],
      });
    });

    it('should return an empty object for undefined metadata', () => {
      expect(sanitizeMetadata(undefined)).toEqual({});
    });
  });
});
