/**
 * PHI Sanitizer Utility
 *
 * HIPAA Compliance: Ensures no Protected Health Information (PHI) reaches
 * logs, audit events or stored error messages.
 *
 * - ❌ Never log: page text, captions, extracted values, document names
 * - ✅ Always log: summaryId, documentKey, documentType, status, counts
 */

const PHI_METADATA_KEYS = new Set([
  'text',
  'content',
  'pages',
  'captionText',
  'caption',
  'documentName',
  'fileName',
  'primaryDiagnosis',
  'chiefComplaint',
  'patientName',
  'name',
  'value',
  'extractedData',
]);

const EMAIL_SOURCE = '[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}';
const PHONE_SOURCE = '(\\+?1[-.\\s]?)?\\(?\\d{3}\\)?[-.\\s]?\\d{3}[-.\\s]?\\d{4}';

/**
 * Sanitize error messages before they are logged or stored
 *
 * Removes email addresses, tokens, SSN and phone patterns, long numbers
 * (record numbers), absolute file paths and "Firstname Lastname" pairs,
 * then truncates.
 */
export function sanitizeErrorMessage(error: string, maxLength = 500): string {
  if (!error) {
    return '';
  }

  let sanitized = error;

  sanitized = sanitized.replace(
    new RegExp(EMAIL_SOURCE, 'g'),
    '[EMAIL_REDACTED]',
  );

  sanitized = sanitized.replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]');
  sanitized = sanitized.replace(
    /api[_-]?key[:\s]+[^\s]+/gi,
    'api_key: [REDACTED]',
  );

  // SSN before phone numbers: the phone pattern would swallow part of it
  sanitized = sanitized.replace(/\d{3}-\d{2}-\d{4}/g, '[SSN_REDACTED]');
  sanitized = sanitized.replace(
    new RegExp(PHONE_SOURCE, 'g'),
    '[PHONE_REDACTED]',
  );
  sanitized = sanitized.replace(/\d{10,}/g, '[NUMBER_REDACTED]');

  // File paths carry document names, which often carry patient names
  sanitized = sanitized.replace(
    /(?:[A-Za-z]:)?(?:[\\/][A-Za-z._~-][^\s\\/'"]*){2,}/g,
    '[PATH_REDACTED]',
  );

  sanitized = sanitized.replace(
    /\b[A-Z][a-z]+\s+[A-Z][a-z]+\b/g,
    '[NAME_REDACTED]',
  );

  return sanitized.substring(0, maxLength);
}

/**
 * Drop PHI-bearing keys from audit metadata, recursing into nested
 * objects and arrays. Counts, ids, types and statuses are kept.
 */
export function sanitizeMetadata(
  metadata: Record<string, unknown> | undefined,
): Record<string, unknown> {
  if (!metadata) {
    return {};
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (PHI_METADATA_KEYS.has(key) || value === undefined) {
      continue;
    }

    if (typeof value === 'string') {
      if (
        new RegExp(EMAIL_SOURCE).test(value) ||
        new RegExp(PHONE_SOURCE).test(value)
      ) {
        continue;
      }
      sanitized[key] = value;
    } else if (Array.isArray(value)) {
      sanitized[key] = value.map((item: unknown) =>
        isPlainObject(item) ? sanitizeMetadata(item) : item,
      );
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeMetadata(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}
