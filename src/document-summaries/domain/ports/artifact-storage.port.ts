export interface StorageHealth {
  status: 'healthy' | 'unhealthy';
  driver: 'local' | 'gcs';
  location: string;
  error?: string;
}

/**
 * Writes summary artifacts (Markdown, vector payloads, reports).
 * Paths are relative to the configured output root.
 */
export interface ArtifactStoragePort {
  /**
   * @returns Location of the written artifact (absolute path or gs:// URI)
   */
  writeText(
    relativePath: string,
    content: string,
    contentType?: string,
  ): Promise<string>;

  writeJson(relativePath: string, data: unknown): Promise<string>;

  /**
   * @returns File contents, or null when the artifact does not exist
   */
  readText(relativePath: string): Promise<string | null>;

  healthCheck(): Promise<StorageHealth>;

  /**
   * Output root shown in run reports
   */
  describeLocation(): string;
}
