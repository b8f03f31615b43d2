import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { constants, promises as fs } from 'fs';
import * as path from 'path';
import {
  ArtifactStoragePort,
  StorageHealth,
} from '../../domain/ports/artifact-storage.port';
import { AllConfigType } from '../../../config/config.type';
import { sanitizeErrorMessage } from '../../../audit/utils/phi-sanitizer.util';
import { isMissingFileError } from '../../../utils/fs-errors';

/**
 * Local Filesystem Artifact Storage
 *
 * Writes artifacts below ARTIFACT_OUTPUT_DIR. Paths that resolve outside
 * the output root are rejected.
 */
@Injectable()
export class LocalArtifactStorageAdapter implements ArtifactStoragePort {
  private readonly logger = new Logger(LocalArtifactStorageAdapter.name);
  private readonly rootDir: string;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    this.rootDir = path.resolve(
      this.configService.getOrThrow('storage.outputDir', { infer: true }),
    );
  }

  // Plain files carry no content type; the parameter only matters for GCS
  async writeText(
    relativePath: string,
    content: string,
    _contentType?: string,
  ): Promise<string> {
    const target = this.resolve(relativePath);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, 'utf-8');
    } catch (error) {
      this.logger.error(
        `[LOCAL STORAGE] Failed to write artifact: ${sanitizeErrorMessage(error instanceof Error ? error.message : String(error))}`,
      );
      throw new Error('Failed to write artifact to storage');
    }
    this.logger.debug(`[LOCAL STORAGE] Wrote ${content.length} chars`);
    return target;
  }

  async writeJson(relativePath: string, data: unknown): Promise<string> {
    return this.writeText(relativePath, JSON.stringify(data, null, 2));
  }

  async readText(relativePath: string): Promise<string | null> {
    const target = this.resolve(relativePath);
    try {
      return await fs.readFile(target, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw new Error('Failed to read artifact from storage');
    }
  }

  async healthCheck(): Promise<StorageHealth> {
    try {
      await fs.mkdir(this.rootDir, { recursive: true });
      await fs.access(this.rootDir, constants.W_OK);
      return { status: 'healthy', driver: 'local', location: this.rootDir };
    } catch (error) {
      return {
        status: 'unhealthy',
        driver: 'local',
        location: this.rootDir,
        error: sanitizeErrorMessage(
          error instanceof Error ? error.message : String(error),
        ),
      };
    }
  }

  describeLocation(): string {
    return this.rootDir;
  }

  private resolve(relativePath: string): string {
    const target = path.resolve(this.rootDir, relativePath);
    if (!target.startsWith(this.rootDir + path.sep)) {
      throw new Error('Artifact path escapes the output directory');
    }
    return target;
  }
}
