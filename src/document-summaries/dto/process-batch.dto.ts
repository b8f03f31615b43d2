import { ApiProperty } from '@nestjs/swagger';
import { ArrayMinSize, IsArray, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { CreateSummaryDto } from './create-summary.dto';

export class ProcessBatchDto {
  @ApiProperty({
    type: [CreateSummaryDto],
    description:
      'Extraction records, processed in order. The batch limit comes from SUMMARY_MAX_BATCH_SIZE.',
  })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => CreateSummaryDto)
  records!: CreateSummaryDto[];
}
