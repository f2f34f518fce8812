/**
 * Response types for extraction
 */

import { ApiProperty } from '@nestjs/swagger';

export class PageTextResponse {
  @ApiProperty({
    description: 'Normalized text, one "--- Page n ---" block per page',
    example: '--- Page 1 ---\n1.1 Revenue is recognised when control passes.',
  })
  text!: string;
}

export class AnswerChunkResponse {
  @ApiProperty({ description: 'Chunk position (1-based)', example: 1 })
  chunkId!: number;

  @ApiProperty({ description: 'Sub-question label', example: '1.1' })
  questionNumber!: string;

  @ApiProperty({
    description: 'Answer text of the chunk',
    example: 'Revenue is recognised when control passes.',
  })
  answer!: string;
}

export class SegmentResponse {
  @ApiProperty({ type: [AnswerChunkResponse] })
  chunks!: AnswerChunkResponse[];
}
