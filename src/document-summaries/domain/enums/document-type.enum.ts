export enum DocumentType {
  CASE_REPORT = 'case_report',
  TEXTBOOK = 'textbook',
  GUIDELINE = 'guideline',
  DISCHARGE_SUMMARY = 'discharge_summary',
  RESEARCH_ARTICLE = 'research_article',
  LAB_REPORT = 'lab_report',
  RADIOLOGY_REPORT = 'radiology_report',
  UNKNOWN = 'unknown',
}
