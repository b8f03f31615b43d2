export type ArtifactStorageDriver = 'local' | 'gcs';

export type StorageConfig = {
  driver: ArtifactStorageDriver;
  outputDir: string; // Local root for the 'local' driver
  gcsBucket?: string;
  gcsPrefix: string; // Object name prefix for the 'gcs' driver
};
