import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Bucket, Storage } from '@google-cloud/storage';
import * as path from 'path';
import {
  ArtifactStoragePort,
  StorageHealth,
} from '../../domain/ports/artifact-storage.port';
import { AllConfigType } from '../../../config/config.type';

/**
 * GCP Cloud Storage Artifact Adapter
 *
 * Objects are written as {ARTIFACT_GCS_PREFIX}{relativePath}.
 *
 * Security:
 * - Never log object names at INFO level (they carry file stems)
 * - Never log artifact contents
 */
@Injectable()
export class GcsArtifactStorageAdapter implements ArtifactStoragePort {
  private readonly logger = new Logger(GcsArtifactStorageAdapter.name);
  private readonly bucket: Bucket;
  private readonly prefix: string;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    // Direct service account key when GOOGLE_APPLICATION_CREDENTIALS is set,
    // otherwise Application Default Credentials
    const credentialsPathEnv = process.env.GOOGLE_APPLICATION_CREDENTIALS;
    const storage = credentialsPathEnv
      ? new Storage({
          keyFilename: path.isAbsolute(credentialsPathEnv)
            ? credentialsPathEnv
            : path.resolve(process.cwd(), credentialsPathEnv),
        })
      : new Storage();

    const bucketName = this.configService.get('storage.gcsBucket', {
      infer: true,
    });
    if (!bucketName) {
      throw new Error(
        'ARTIFACT_GCS_BUCKET must be set when ARTIFACT_STORAGE_DRIVER=gcs',
      );
    }

    this.bucket = storage.bucket(bucketName);
    this.prefix = this.configService.getOrThrow('storage.gcsPrefix', {
      infer: true,
    });

    this.logger.log('GCP Storage artifact adapter initialized');
  }

  async writeText(
    relativePath: string,
    content: string,
    contentType = 'text/markdown; charset=utf-8',
  ): Promise<string> {
    const objectKey = this.objectKey(relativePath);
    try {
      await this.bucket.file(objectKey).save(Buffer.from(content, 'utf-8'), {
        contentType,
        resumable: false, // Artifacts are small
        metadata: {
          writtenAt: new Date().toISOString(),
        },
      });
    } catch (error) {
      this.logger.error(
        `[GCP STORAGE] Failed to write artifact: ${this.sanitizeError(error)}`,
      );
      throw new Error('Failed to write artifact to storage');
    }

    this.logger.debug(`[GCP STORAGE] Wrote ${content.length} chars`);
    return `gs://${this.bucket.name}/${objectKey}`;
  }

  async writeJson(relativePath: string, data: unknown): Promise<string> {
    return this.writeText(
      relativePath,
      JSON.stringify(data, null, 2),
      'application/json',
    );
  }

  async readText(relativePath: string): Promise<string | null> {
    const file = this.bucket.file(this.objectKey(relativePath));
    try {
      const [exists] = await file.exists();
      if (!exists) {
        return null;
      }
      const [contents] = await file.download();
      return contents.toString('utf-8');
    } catch (error) {
      this.logger.error(
        `[GCP STORAGE] Failed to read artifact: ${this.sanitizeError(error)}`,
      );
      throw new Error('Failed to read artifact from storage');
    }
  }

  async healthCheck(): Promise<StorageHealth> {
    const location = this.describeLocation();
    try {
      const [exists] = await this.bucket.exists();
      return exists
        ? { status: 'healthy', driver: 'gcs', location }
        : {
            status: 'unhealthy',
            driver: 'gcs',
            location,
            error: 'Bucket does not exist',
          };
    } catch (error) {
      return {
        status: 'unhealthy',
        driver: 'gcs',
        location,
        error: this.sanitizeError(error),
      };
    }
  }

  describeLocation(): string {
    return `gs://${this.bucket.name}/${this.prefix}`;
  }

  private objectKey(relativePath: string): string {
    const normalized = path.posix.normalize(relativePath.replace(/\\/g, '/'));
    if (normalized.startsWith('..') || path.posix.isAbsolute(normalized)) {
      throw new Error('Artifact path escapes the output prefix');
    }
    return `${this.prefix}${normalized}`;
  }

  private sanitizeError(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    // Remove GCS URIs, project IDs, bucket names
    return message
      .replace(/gs:\/\/[^\s]+/g, '[GCS_URI_REDACTED]')
      .replace(/projects\/[^/\s]+/g, 'projects/[PROJECT_REDACTED]')
      .substring(0, 200);
  }
}
