import { DocumentType } from '../domain/enums/document-type.enum';

export interface ParsedSubsection {
  heading: string;
  body: string[];
}

export interface ParsedSection {
  heading: string; // Leading emoji stripped
  fields: Record<string, string>;
  items: string[];
  body: string[];
  subsections: ParsedSubsection[];
}

export interface ParsedImage {
  index: number;
  pageNumber: number;
  captionText: string;
  classificationTag: string;
}

export interface ParsedSummary {
  title?: string;
  documentName?: string;
  documentType?: string;
  confidencePercent?: number;
  processedAt?: string;
  sections: ParsedSection[];
  images: ParsedImage[];
}

const TITLE_PATTERN = /^# (.+)$/;
const DOCUMENT_PATTERN = /^\*\*Document:\*\*[ \t]*(.*)$/;
const TYPE_PATTERN =
  /^\*\*Type:\*\*[ \t]*(\S+)(?:[ \t]*\(confidence:[ \t]*(-?\d+(?:\.\d+)?)%\))?/;
const PROCESSED_PATTERN = /^\*\*Processed:\*\*[ \t]*(.*)$/;
const SECTION_PATTERN = /^## (.+)$/;
const SUBSECTION_PATTERN = /^### (.+)$/;
const IMAGE_PATTERN =
  /^- \*\*Image (\d+)\*\* \(Page (\d+)\): (.*) \[([A-Za-z_]+)\]$/;
const FIELD_PATTERN = /^- \*\*(.+?):\*\*[ \t]*(.*)$/;
const ITEM_PATTERN = /^- (.+)$/;

function stripLeadingSymbols(heading: string): string {
  return heading.replace(/^[^\p{L}\p{N}]+/u, '').trim();
}

/**
 * Read a Markdown summary back into its header fields and sections
 */
export function parseSummaryMarkdown(markdown: string): ParsedSummary {
  const parsed: ParsedSummary = { sections: [], images: [] };
  let section: ParsedSection | undefined;
  let subsection: ParsedSubsection | undefined;

  for (const rawLine of markdown.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    if (!line.trim()) {
      continue;
    }

    const sectionMatch = SECTION_PATTERN.exec(line);
    if (sectionMatch) {
      section = {
        heading: stripLeadingSymbols(sectionMatch[1]),
        fields: {},
        items: [],
        body: [],
        subsections: [],
      };
      subsection = undefined;
      parsed.sections.push(section);
      continue;
    }

    if (!section) {
      const title = TITLE_PATTERN.exec(line);
      if (title && parsed.title === undefined) {
        parsed.title = title[1].trim();
        continue;
      }
      const documentMatch = DOCUMENT_PATTERN.exec(line);
      if (documentMatch) {
        parsed.documentName = documentMatch[1].trim();
        continue;
      }
      const typeMatch = TYPE_PATTERN.exec(line);
      if (typeMatch) {
        parsed.documentType = typeMatch[1];
        if (typeMatch[2] !== undefined) {
          parsed.confidencePercent = parseFloat(typeMatch[2]);
        }
        continue;
      }
      const processedMatch = PROCESSED_PATTERN.exec(line);
      if (processedMatch) {
        parsed.processedAt = processedMatch[1].trim();
      }
      continue;
    }

    const subsectionMatch = SUBSECTION_PATTERN.exec(line);
    if (subsectionMatch) {
      subsection = { heading: subsectionMatch[1].trim(), body: [] };
      section.subsections.push(subsection);
      continue;
    }

    const imageMatch = IMAGE_PATTERN.exec(line);
    if (imageMatch) {
      parsed.images.push({
        index: parseInt(imageMatch[1], 10),
        pageNumber: parseInt(imageMatch[2], 10),
        captionText: imageMatch[3] === 'No caption' ? '' : imageMatch[3],
        classificationTag: imageMatch[4],
      });
      continue;
    }

    const fieldMatch = FIELD_PATTERN.exec(line);
    if (fieldMatch) {
      section.fields[fieldMatch[1]] = fieldMatch[2].trim();
      continue;
    }

    const itemMatch = ITEM_PATTERN.exec(line);
    if (itemMatch) {
      section.items.push(itemMatch[1].trim());
      continue;
    }

    if (subsection) {
      subsection.body.push(line.trim());
    } else {
      section.body.push(line.trim());
    }
  }

  return parsed;
}

const DOCUMENT_TYPES: string[] = Object.values(DocumentType);

/**
 * Structural problems in a Markdown summary; empty when valid
 */
export function validateSummaryMarkdown(markdown: string): string[] {
  const parsed = parseSummaryMarkdown(markdown);
  const issues: string[] = [];

  if (!parsed.documentName) {
    issues.push('Missing "Document" field');
  }

  if (!parsed.documentType) {
    issues.push('Missing "Type" field');
  } else {
    if (!DOCUMENT_TYPES.includes(parsed.documentType)) {
      issues.push(`Unknown document type "${parsed.documentType}"`);
    }
    if (parsed.confidencePercent === undefined) {
      issues.push('Missing confidence percentage on "Type" field');
    } else if (
      parsed.confidencePercent < 0 ||
      parsed.confidencePercent > 100
    ) {
      issues.push(
        `Confidence ${parsed.confidencePercent}% is outside 0-100`,
      );
    }
  }

  if (parsed.processedAt === undefined) {
    issues.push('Missing "Processed" field');
  } else if (Number.isNaN(Date.parse(parsed.processedAt))) {
    issues.push(`Unparsable "Processed" timestamp "${parsed.processedAt}"`);
  }

  return issues;
}
