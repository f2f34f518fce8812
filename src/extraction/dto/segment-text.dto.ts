/**
 * DTO for text segmentation request
 */

import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class SegmentTextDto {
  @ApiProperty({
    description: 'Answer text for one question',
    example: '1.1 Revenue is recognised when control passes.\n1.2 Goodwill is tested annually.',
  })
  @IsString()
  text!: string;

  @ApiProperty({
    description: 'Main question number',
    example: '1',
  })
  @IsString()
  @IsNotEmpty()
  questionNumber!: string;
}
