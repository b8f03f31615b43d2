import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class SummaryValidationResponseDto {
  @ApiProperty()
  valid!: boolean;

  @ApiProperty({
    type: [String],
    example: ['Missing confidence percentage on "Type" field'],
  })
  issues!: string[];

  @ApiPropertyOptional({ description: 'Type tag as written in the summary' })
  documentType?: string;

  @ApiProperty({
    type: [String],
    description: 'Section headings found, without emoji',
  })
  sections!: string[];

  @ApiProperty()
  imageCount!: number;
}
