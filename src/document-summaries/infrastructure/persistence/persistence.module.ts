import { Module } from '@nestjs/common';
import { DatabaseConfig } from '../../../database/config/database-config.type';
import databaseConfig from '../../../database/config/database.config';
import { MemorySummaryPersistenceModule } from './memory/memory-persistence.module';
import { RelationalSummaryPersistenceModule } from './relational/relational-persistence.module';

// <database-block>
const infrastructurePersistenceModule =
  (databaseConfig() as DatabaseConfig).driver === 'memory'
    ? MemorySummaryPersistenceModule
    : RelationalSummaryPersistenceModule;
// </database-block>

@Module({
  imports: [infrastructurePersistenceModule],
  exports: [infrastructurePersistenceModule],
})
export class SummaryPersistenceModule {}
