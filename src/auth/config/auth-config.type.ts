export type AuthConfig = {
  // Shared key for service-to-service callers that write summaries
  serviceApiKey?: string;
};
