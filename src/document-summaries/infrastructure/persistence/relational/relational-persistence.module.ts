import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DocumentSummaryEntity } from './entities/document-summary.entity';
import { DocumentSummaryRepositoryAdapter } from './repositories/document-summary.repository';

@Module({
  imports: [TypeOrmModule.forFeature([DocumentSummaryEntity])],
  providers: [
    {
      provide: 'DocumentSummaryRepositoryPort',
      useClass: DocumentSummaryRepositoryAdapter,
    },
  ],
  exports: ['DocumentSummaryRepositoryPort'],
})
export class RelationalSummaryPersistenceModule {}
