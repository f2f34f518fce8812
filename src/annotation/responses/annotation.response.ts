/**
 * Response types for annotation
 */

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

import type {
  AnnotationIssue,
  AnnotationIssueKind,
  AnnotationReport,
} from '../types/annotation.types';

export class AnnotationIssueResponse implements AnnotationIssue {
  @ApiProperty({
    enum: ['label', 'score', 'comment', 'underline', 'line', 'tick'],
    example: 'line',
  })
  kind!: AnnotationIssueKind;

  @ApiPropertyOptional({ description: '0-based page', example: 2 })
  pageIndex?: number;

  @ApiProperty({ example: 'Revenue is recognised when control passes' })
  subject!: string;

  @ApiProperty({ example: 'no match' })
  reason!: string;
}

export class AnnotationReportResponse implements AnnotationReport {
  @ApiProperty({ example: 4 })
  pagesProcessed!: number;

  @ApiProperty({ example: 6 })
  scoresPlaced!: number;

  @ApiProperty({ example: 6 })
  commentsPlaced!: number;

  @ApiProperty({ example: 1 })
  commentsTruncated!: number;

  @ApiProperty({ example: 9 })
  underlinesDrawn!: number;

  @ApiProperty({ example: 11 })
  linesMatched!: number;

  @ApiProperty({ example: 1 })
  linesUnmatched!: number;

  @ApiProperty({ example: 10 })
  ticksPlaced!: number;

  @ApiProperty({ example: 1 })
  duplicateTicks!: number;

  @ApiProperty({ type: [AnnotationIssueResponse] })
  issues!: AnnotationIssueResponse[];
}

export class AnnotationResponse {
  @ApiProperty({ example: true })
  success!: boolean;

  @ApiProperty({ example: 'Annotated PDF saved' })
  message!: string;

  @ApiPropertyOptional({
    example: 'annotations/jane-doe/jane-doe_annotated.pdf',
  })
  outputPath?: string;

  @ApiProperty({ type: AnnotationReportResponse })
  report!: AnnotationReportResponse;
}
