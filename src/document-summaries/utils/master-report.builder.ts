import { DocumentType } from '../domain/enums/document-type.enum';
import { formatConfidence, titleCase } from './summary-markdown.renderer';

export interface ReportDocumentEntry {
  file: string;
  type: DocumentType;
  confidence: number; // Fraction 0-1
  folder: string;
  chunks: number;
}

export interface ReportFailureEntry {
  file: string;
  error: string;
}

export interface RunStatistics {
  totalProcessed: number;
  byType: Partial<Record<DocumentType, number>>;
  totalFailed: number;
}

export interface DocumentIndex {
  processingDate: string;
  statistics: RunStatistics;
  documents: ReportDocumentEntry[];
  failed: ReportFailureEntry[];
}

export interface MasterReportInput {
  generatedAt: Date;
  outputLocation: string;
  documents: ReportDocumentEntry[];
  failed: ReportFailureEntry[];
}

export interface MasterReport {
  markdown: string;
  index: DocumentIndex;
}

function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Group documents by type, keeping the order in which types first appear
 */
function groupByType(
  documents: ReportDocumentEntry[],
): Map<DocumentType, ReportDocumentEntry[]> {
  const groups = new Map<DocumentType, ReportDocumentEntry[]>();
  for (const document of documents) {
    const group = groups.get(document.type) ?? [];
    group.push(document);
    groups.set(document.type, group);
  }
  return groups;
}

/**
 * Build the run-level MASTER_REPORT.md and document_index.json contents
 */
export function buildMasterReport(input: MasterReportInput): MasterReport {
  const groups = groupByType(input.documents);

  const byType: Partial<Record<DocumentType, number>> = {};
  for (const [type, documents] of groups) {
    byType[type] = documents.length;
  }

  const statistics: RunStatistics = {
    totalProcessed: input.documents.length,
    byType,
    totalFailed: input.failed.length,
  };

  const lines = [
    '# Clinical Document Processing Report',
    '',
    `**Generated:** ${formatTimestamp(input.generatedAt)}`,
    `**Output Directory:** \`${input.outputLocation}\``,
    '',
    '## 📊 Summary Statistics',
    '',
    `- **Total Files Processed:** ${statistics.totalProcessed}`,
    `- **Failed Files:** ${statistics.totalFailed}`,
    '',
  ];

  if (groups.size > 0) {
    lines.push('### Document Type Distribution', '');
    for (const [type, documents] of groups) {
      lines.push(`- **${titleCase(type)}:** ${plural(documents.length, 'file')}`);
    }
    lines.push('');
  }

  for (const [type, documents] of groups) {
    lines.push(`## ${titleCase(type)} Files`, '');
    for (const document of documents) {
      lines.push(
        `### 📄 ${document.file}`,
        `- **Confidence:** ${formatConfidence(document.confidence)}`,
        `- **Chunks:** ${document.chunks}`,
        `- **Folder:** \`${document.folder}\``,
        '',
      );
    }
  }

  if (input.failed.length > 0) {
    lines.push('## ❌ Failed Files', '');
    for (const failure of input.failed) {
      lines.push(`- **${failure.file}:** ${failure.error.slice(0, 100)}`);
    }
    lines.push('');
  }

  return {
    markdown: lines.join('\n'),
    index: {
      processingDate: input.generatedAt.toISOString(),
      statistics,
      documents: input.documents,
      failed: input.failed,
    },
  };
}
