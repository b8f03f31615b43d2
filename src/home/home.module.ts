import { Module } from '@nestjs/common';
import { HomeService } from './home.service';
import { HomeController } from './home.controller';
import { HealthService } from './health.service';
import { DocumentSummariesModule } from '../document-summaries/document-summaries.module';

@Module({
  imports: [
    // Provides ArtifactStoragePort for the storage health check
    DocumentSummariesModule,
  ],
  controllers: [HomeController],
  providers: [HomeService, HealthService],
  exports: [HealthService],
})
export class HomeModule {}
