import { Module } from '@nestjs/common';
import { InMemoryDocumentSummaryRepository } from './in-memory-document-summary.repository';

@Module({
  providers: [
    {
      provide: 'DocumentSummaryRepositoryPort',
      useClass: InMemoryDocumentSummaryRepository,
    },
  ],
  exports: ['DocumentSummaryRepositoryPort'],
})
export class MemorySummaryPersistenceModule {}
