import { registerAs } from '@nestjs/config';
import {
  IsOptional,
  IsInt,
  Min,
  Max,
  IsString,
  ValidateIf,
  IsBoolean,
  IsIn,
} from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { DatabaseConfig, DatabaseDriver } from './database-config.type';

const needsConnectionFields = (envValues: EnvironmentVariablesValidator) =>
  envValues.DATABASE_DRIVER !== 'memory' && !envValues.DATABASE_URL;

class EnvironmentVariablesValidator {
  @IsIn(['relational', 'memory'])
  @IsOptional()
  DATABASE_DRIVER?: DatabaseDriver;

  @IsString()
  @IsOptional()
  DATABASE_URL?: string;

  @ValidateIf(needsConnectionFields)
  @IsString()
  DATABASE_TYPE?: string;

  @ValidateIf(needsConnectionFields)
  @IsString()
  DATABASE_HOST?: string;

  @ValidateIf(needsConnectionFields)
  @IsInt()
  @Min(0)
  @Max(65535)
  DATABASE_PORT?: number;

  @ValidateIf(needsConnectionFields)
  @IsString()
  DATABASE_PASSWORD?: string;

  @ValidateIf(needsConnectionFields)
  @IsString()
  DATABASE_NAME?: string;

  @ValidateIf(needsConnectionFields)
  @IsString()
  DATABASE_USERNAME?: string;

  @IsBoolean()
  @IsOptional()
  DATABASE_SYNCHRONIZE?: boolean;

  @IsInt()
  @IsOptional()
  DATABASE_MAX_CONNECTIONS?: number;

  @IsBoolean()
  @IsOptional()
  DATABASE_SSL_ENABLED?: boolean;

  @IsBoolean()
  @IsOptional()
  DATABASE_REJECT_UNAUTHORIZED?: boolean;

  @IsString()
  @IsOptional()
  DATABASE_CA?: string;

  @IsString()
  @IsOptional()
  DATABASE_KEY?: string;

  @IsString()
  @IsOptional()
  DATABASE_CERT?: string;
}

export default registerAs<DatabaseConfig>('database', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    driver: process.env.DATABASE_DRIVER === 'memory' ? 'memory' : 'relational',
    url: process.env.DATABASE_URL,
    type: process.env.DATABASE_TYPE,
    host: process.env.DATABASE_HOST,
    port: process.env.DATABASE_PORT
      ? parseInt(process.env.DATABASE_PORT, 10)
      : 5432,
    password: process.env.DATABASE_PASSWORD,
    name: process.env.DATABASE_NAME,
    username: process.env.DATABASE_USERNAME,
    synchronize: process.env.DATABASE_SYNCHRONIZE === 'true',
    maxConnections: process.env.DATABASE_MAX_CONNECTIONS
      ? parseInt(process.env.DATABASE_MAX_CONNECTIONS, 10)
      : 100,
    sslEnabled: process.env.DATABASE_SSL_ENABLED === 'true',
    rejectUnauthorized: process.env.DATABASE_REJECT_UNAUTHORIZED === 'true',
    ca: process.env.DATABASE_CA,
    key: process.env.DATABASE_KEY,
    cert: process.env.DATABASE_CERT,
    logging:
      process.env.DATABASE_LOGGING === 'true' ? ['error', 'warn'] : false,
  };
});
