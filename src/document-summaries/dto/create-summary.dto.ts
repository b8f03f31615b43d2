import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayMinSize,
  IsArray,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { DocumentType } from '../domain/enums/document-type.enum';
import { ImageClassification } from '../domain/enums/image-classification.enum';

export class PageTextDto {
  @ApiProperty({ minimum: 1, example: 1 })
  @IsInt()
  @Min(1)
  pageNumber!: number;

  @ApiProperty({ description: 'Extracted page text (PHI)' })
  @IsString()
  text!: string;
}

export class ClassificationDto {
  @ApiProperty({ enum: DocumentType, example: DocumentType.CASE_REPORT })
  @IsEnum(DocumentType)
  documentType!: DocumentType;

  @ApiProperty({
    minimum: 0,
    maximum: 1,
    example: 0.87,
    description: 'Classifier confidence as a fraction',
  })
  @IsNumber()
  @Min(0)
  @Max(1)
  confidence!: number;
}

export class SourceImageDto {
  @ApiProperty({ minimum: 1 })
  @IsInt()
  @Min(1)
  pageNumber!: number;

  @ApiProperty({ minimum: 0 })
  @IsInt()
  @Min(0)
  index!: number;

  @ApiPropertyOptional({ maxLength: 2000 })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  captionText?: string;

  @ApiProperty({ enum: ImageClassification })
  @IsEnum(ImageClassification)
  classificationTag!: ImageClassification;
}

/**
 * Extraction record produced by the upstream PDF/OCR step
 */
export class CreateSummaryDto {
  @ApiProperty({ example: 'dengue_case.pdf', maxLength: 255 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  documentName!: string;

  @ApiProperty({ minimum: 1, example: 4 })
  @IsInt()
  @Min(1)
  pageCount!: number;

  @ApiProperty({ type: [PageTextDto] })
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => PageTextDto)
  pages!: PageTextDto[];

  @ApiProperty({ type: ClassificationDto })
  @ValidateNested()
  @Type(() => ClassificationDto)
  classification!: ClassificationDto;

  @ApiPropertyOptional({ type: [SourceImageDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SourceImageDto)
  images?: SourceImageDto[];
}
