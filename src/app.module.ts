import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { DataSource, DataSourceOptions } from 'typeorm';
import appConfig from './config/app.config';
import throttlerConfig from './config/throttler.config';
import authConfig from './auth/config/auth.config';
import databaseConfig from './database/config/database.config';
import { DatabaseConfig } from './database/config/database-config.type';
import storageConfig from './document-summaries/config/storage.config';
import summariesConfig from './document-summaries/config/summaries.config';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { DocumentSummariesModule } from './document-summaries/document-summaries.module';
import { HomeModule } from './home/home.module';
import { AuditModule } from './audit/audit.module';
import { HttpsEnforcementMiddleware } from './utils/https-enforcement.middleware';
import { AllConfigType } from './config/config.type';

// <database-block>
const infrastructureDatabaseModule =
  (databaseConfig() as DatabaseConfig).driver === 'memory'
    ? []
    : [
        TypeOrmModule.forRootAsync({
          useClass: TypeOrmConfigService,
          dataSourceFactory: async (options?: DataSourceOptions) => {
            if (!options) {
              throw new Error('Missing TypeORM data source options');
            }
            return new DataSource(options).initialize();
          },
        }),
      ];
// </database-block>

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
        throttlerConfig,
      ],
      envFilePath: ['.env'],
    }),
    ...infrastructureDatabaseModule,
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => [
        {
          ttl: configService.getOrThrow('throttler.ttl', { infer: true }),
          limit: configService.getOrThrow('throttler.limit', { infer: true }),
        },
      ],
    }),
    AuditModule,
    DocumentSummariesModule,
    HomeModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(HttpsEnforcementMiddleware).forRoutes('*');
  }
}
