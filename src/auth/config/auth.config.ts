import { registerAs } from '@nestjs/config';

import { IsOptional, IsString, MinLength } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { AuthConfig } from './auth-config.type';

class EnvironmentVariablesValidator {
  @IsString()
  @MinLength(16)
  @IsOptional()
  SERVICE_API_KEY?: string;
}

export default registerAs<AuthConfig>('auth', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    serviceApiKey: process.env.SERVICE_API_KEY,
  };
});
