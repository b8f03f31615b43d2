export type SummariesConfig = {
  maxImagesInSummary: number;
  maxBatchSize: number; // Records per batch request
};
