import { AppConfig } from './app-config.type';
import { AuthConfig } from '../auth/config/auth-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { StorageConfig } from '../document-summaries/config/storage-config.type';
import { SummariesConfig } from '../document-summaries/config/summaries-config.type';
import { ThrottlerConfig } from './throttler-config.type';

export type AllConfigType = {
  app: AppConfig;
  auth: AuthConfig;
  database: DatabaseConfig;
  storage: StorageConfig;
  summaries: SummariesConfig;
  throttler: ThrottlerConfig;
};
