export enum SummaryStatus {
  RECEIVED = 'RECEIVED', // Extraction record accepted and persisted
  EXTRACTING = 'EXTRACTING', // Field extraction and rendering in progress
  SUMMARIZED = 'SUMMARIZED', // Summary and artifacts written
  FAILED = 'FAILED', // Extraction or artifact write failed
}
