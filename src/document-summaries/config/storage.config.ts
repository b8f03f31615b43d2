import { registerAs } from '@nestjs/config';
import { IsIn, IsOptional, IsString, ValidateIf } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { ArtifactStorageDriver, StorageConfig } from './storage-config.type';

class EnvironmentVariablesValidator {
  @IsIn(['local', 'gcs'])
  @IsOptional()
  ARTIFACT_STORAGE_DRIVER?: ArtifactStorageDriver;

  @IsString()
  @IsOptional()
  ARTIFACT_OUTPUT_DIR?: string;

  @ValidateIf(
    (envValues: EnvironmentVariablesValidator) =>
      envValues.ARTIFACT_STORAGE_DRIVER === 'gcs',
  )
  @IsString()
  ARTIFACT_GCS_BUCKET?: string;

  @IsString()
  @IsOptional()
  ARTIFACT_GCS_PREFIX?: string;
}

export default registerAs<StorageConfig>('storage', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    driver: process.env.ARTIFACT_STORAGE_DRIVER === 'gcs' ? 'gcs' : 'local',
    outputDir: process.env.ARTIFACT_OUTPUT_DIR || './output',
    gcsBucket: process.env.ARTIFACT_GCS_BUCKET,
    gcsPrefix: process.env.ARTIFACT_GCS_PREFIX ?? 'summaries/',
  };
});
