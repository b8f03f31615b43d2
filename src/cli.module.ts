import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from './config/app.config';
import authConfig from './auth/config/auth.config';
import databaseConfig from './database/config/database.config';
import storageConfig from './document-summaries/config/storage.config';
import summariesConfig from './document-summaries/config/summaries.config';
import { DocumentSummariesModule } from './document-summaries/document-summaries.module';

/**
 * Application context for command-line runs: no HTTP server, no database.
 * The CLI selects the in-memory driver before this module is loaded.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [
        appConfig,
        authConfig,
        databaseConfig,
        storageConfig,
        summariesConfig,
      ],
      envFilePath: ['.env'],
    }),
    DocumentSummariesModule,
  ],
})
export class CliModule {}
