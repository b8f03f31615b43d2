import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsOptional, IsNumber, Min, Max } from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { DocumentType } from '../domain/enums/document-type.enum';
import { SummaryStatus } from '../domain/enums/summary-status.enum';

// ?status=FAILED and ?status=FAILED&status=RECEIVED both become arrays
const toArray = ({ value }: { value: unknown }): unknown =>
  value === undefined || Array.isArray(value) ? value : [value];

export class SummaryListQueryDto {
  @ApiPropertyOptional({ minimum: 1, default: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(1)
  page?: number = 1;

  @ApiPropertyOptional({ minimum: 1, maximum: 100, default: 20 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(1)
  @Max(100)
  limit?: number = 20;

  @ApiPropertyOptional({ enum: SummaryStatus, isArray: true })
  @IsOptional()
  @Transform(toArray)
  @IsEnum(SummaryStatus, { each: true })
  status?: SummaryStatus[];

  @ApiPropertyOptional({ enum: DocumentType, isArray: true })
  @IsOptional()
  @Transform(toArray)
  @IsEnum(DocumentType, { each: true })
  documentType?: DocumentType[];
}
