/**
 * DTO for annotation request
 */

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  Allow,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

import type {
  GradeRow,
  ModelAnswerEntry,
  RubricCellInput,
} from '../../common/types/grade';

import { IsStringOrNumber } from './rubric.validators';

export class GradeRowDto implements GradeRow {
  @ApiProperty({ description: 'Question number', example: '1.1' })
  @IsStringOrNumber()
  question_number!: string | number;

  @ApiProperty({ description: 'Awarded score', example: '3' })
  @IsStringOrNumber()
  score!: string | number;

  @ApiProperty({ description: 'Marks available', example: '5' })
  @IsStringOrNumber()
  total_marks!: string | number;

  @ApiPropertyOptional({
    description: 'Feedback written beside the question',
    example: 'Explain the recognition criteria in more detail.',
  })
  @IsOptional()
  @IsStringOrNumber()
  comment?: string | number | null;

  @ApiPropertyOptional({
    description: 'Credited lines: a list literal, a bare line or a list',
    example: "['Revenue is recognised when control passes']",
  })
  // Any JSON value; unreadable cells resolve to nothing at ingestion
  @Allow()
  correct_lines?: RubricCellInput;

  @ApiPropertyOptional({
    description: 'Credited phrases to underline',
    example: "['control passes', 'performance obligation']",
  })
  @Allow()
  correct_words?: RubricCellInput;
}

export class ModelAnswerDto implements ModelAnswerEntry {
  @ApiProperty({ description: 'Question number', example: '1.1' })
  @IsString()
  question_number!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  answer?: string | null;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  marking_criteria?: string | null;

  @ApiPropertyOptional({ example: '5' })
  @IsOptional()
  @IsString()
  total_marks_available?: string | null;

  @ApiPropertyOptional({ example: '5 marks' })
  @IsOptional()
  @IsString()
  maximum_marks?: string | null;

  @ApiPropertyOptional({ type: () => [ModelAnswerDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ModelAnswerDto)
  sub_answers?: ModelAnswerDto[] | null;
}

export class AnnotateDocumentDto {
  @ApiProperty({
    description: 'Local path of the student script',
    example: '/data/scripts/jane-doe.pdf',
  })
  @IsString()
  @IsNotEmpty()
  inputPdfPath!: string;

  @ApiProperty({ description: 'Student name', example: 'Jane-Doe' })
  @IsString()
  @IsNotEmpty()
  studentName!: string;

  @ApiPropertyOptional({
    description: 'Output directory, defaults to ANNOTATION_OUTPUT_DIR',
    example: 'annotations',
  })
  @IsOptional()
  @IsString()
  outputDir?: string;

  @ApiPropertyOptional({ type: [GradeRowDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => GradeRowDto)
  grades?: GradeRowDto[];

  @ApiPropertyOptional({
    description: 'JSON file with grade rows, used when grades is absent',
    example: '/data/grades/jane-doe.json',
  })
  @IsOptional()
  @IsString()
  gradesPath?: string;

  @ApiPropertyOptional({ type: [ModelAnswerDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ModelAnswerDto)
  modelAnswers?: ModelAnswerDto[];
}
