import { ApiProperty } from '@nestjs/swagger';
import { IsString, MaxLength } from 'class-validator';

export class ValidateSummaryDto {
  @ApiProperty({
    description: 'Markdown summary to check',
    example:
      '# Case Report Summary\n\n**Document:** case.pdf\n**Type:** case_report (confidence: 87%)\n**Processed:** 2024-03-01T10:00:00.000Z\n',
  })
  @IsString()
  @MaxLength(1_000_000)
  markdown!: string;
}
