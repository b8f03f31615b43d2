import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { SummariesConfig } from './summaries-config.type';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(0)
  @Max(100)
  @IsOptional()
  SUMMARY_MAX_IMAGES?: number;

  @IsInt()
  @Min(1)
  @Max(500)
  @IsOptional()
  SUMMARY_MAX_BATCH_SIZE?: number;
}

export default registerAs<SummariesConfig>('summaries', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    maxImagesInSummary: parseInt(process.env.SUMMARY_MAX_IMAGES ?? '10', 10),
    maxBatchSize: parseInt(process.env.SUMMARY_MAX_BATCH_SIZE ?? '50', 10),
  };
});
