/**
 * DTO for page text extraction request
 */

import { ApiProperty } from '@nestjs/swagger';
import {
  ArrayMinSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsString,
  Min,
} from 'class-validator';

export class ExtractPageTextDto {
  @ApiProperty({
    description: 'Local path of the PDF',
    example: '/data/scripts/jane-doe.pdf',
  })
  @IsString()
  @IsNotEmpty()
  pdfPath!: string;

  @ApiProperty({
    description: 'Page numbers to read (1-based)',
    example: [1, 2, 3],
    type: [Number],
  })
  @IsArray()
  @ArrayMinSize(1, { message: 'At least one page number is required' })
  @IsInt({ each: true })
  @Min(1, { each: true })
  pages!: number[];
}

export class SegmentPagesDto extends ExtractPageTextDto {
  @ApiProperty({
    description: 'Main question number the pages answer',
    example: '1',
  })
  @IsString()
  @IsNotEmpty()
  questionNumber!: string;
}
