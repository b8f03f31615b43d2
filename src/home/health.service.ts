import { Inject, Injectable } from '@nestjs/common';
import {
  ArtifactStoragePort,
  StorageHealth,
} from '../document-summaries/domain/ports/artifact-storage.port';

/**
 * Health Check Service
 *
 * Used by monitoring systems and load balancers to verify that summary
 * artifacts can be written.
 */
@Injectable()
export class HealthService {
  constructor(
    @Inject('ArtifactStoragePort')
    private readonly artifactStorage: ArtifactStoragePort,
  ) {}

  checkStorageHealth(): Promise<StorageHealth> {
    return this.artifactStorage.healthCheck();
  }
}
