import { createHash } from 'crypto';
import * as path from 'path';
import { DocumentType } from '../domain/enums/document-type.enum';

export function fileStem(documentName: string): string {
  return path.parse(documentName).name;
}

/**
 * Stable 12-hex-char key derived from the file stem; prefixes chunk ids
 */
export function buildDocumentKey(documentName: string): string {
  return createHash('md5')
    .update(fileStem(documentName))
    .digest('hex')
    .substring(0, 12);
}

/**
 * File stem reduced to characters safe in local paths and object names
 */
export function safeFileStem(documentName: string): string {
  const safe = fileStem(documentName)
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^[._]+/, '');
  return safe || 'document';
}

export function artifactFolderFor(
  documentType: DocumentType,
  documentName: string,
): string {
  return `${documentType}_${safeFileStem(documentName)}`;
}

export interface SummaryArtifactPaths {
  markdown: string;
  vectorDb: string;
  extractionReport: string;
}

export function summaryArtifactPaths(
  artifactFolder: string,
  documentName: string,
): SummaryArtifactPaths {
  const stem = safeFileStem(documentName);
  return {
    markdown: `${artifactFolder}/${stem}_summary.md`,
    vectorDb: `${artifactFolder}/${stem}_vector_db.json`,
    extractionReport: `${artifactFolder}/extraction_report.json`,
  };
}
