export const SERVICE_API_KEY = 'test-service-key-0001';
export const SUMMARIES_URL = '/api/v1/summaries';
export const REPORTS_URL = '/api/v1/reports';
