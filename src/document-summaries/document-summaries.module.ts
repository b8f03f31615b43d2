import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import storageConfig from './config/storage.config';
import summariesConfig from './config/summaries.config';
import { DocumentSummariesController } from './document-summaries.controller';
import { ReportsController } from './reports.controller';
import { DocumentSummariesService } from './document-summaries.service';
import { DocumentSummaryDomainService } from './domain/services/document-summary.domain.service';
import { ArtifactStoragePort } from './domain/ports/artifact-storage.port';
import { SummaryPersistenceModule } from './infrastructure/persistence/persistence.module';
import { GcsArtifactStorageAdapter } from './infrastructure/storage/gcs-artifact-storage.adapter';
import { LocalArtifactStorageAdapter } from './infrastructure/storage/local-artifact-storage.adapter';
import { AuditModule } from '../audit/audit.module';
import { AllConfigType } from '../config/config.type';

@Module({
  imports: [
    // Configuration
    ConfigModule.forFeature(storageConfig),
    ConfigModule.forFeature(summariesConfig),

    // Database (relational or in-memory, by DATABASE_DRIVER)
    SummaryPersistenceModule,

    // Audit logging
    AuditModule,
  ],
  controllers: [DocumentSummariesController, ReportsController],
  providers: [
    // Application layer
    DocumentSummariesService,

    // Domain layer
    DocumentSummaryDomainService,

    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: 'ArtifactStoragePort',
      inject: [ConfigService],
      useFactory: (
        configService: ConfigService<AllConfigType>,
      ): ArtifactStoragePort =>
        configService.getOrThrow('storage.driver', { infer: true }) === 'gcs'
          ? new GcsArtifactStorageAdapter(configService)
          : new LocalArtifactStorageAdapter(configService),
    },
  ],
  exports: [DocumentSummariesService, 'ArtifactStoragePort'],
})
export class DocumentSummariesModule {}
