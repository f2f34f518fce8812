/**
 * Grade Ingestion Service
 * Resolves grading rows into lookup tables and flat evidence lists
 */

import { promises as fs } from 'fs';

import { Injectable, Logger } from '@nestjs/common';

import { NO_ANSWER_COMMENT } from '../../common/constants';
import type {
  GradeRecord,
  GradeRow,
  ModelAnswerEntry,
  RubricCell,
  RubricCellInput,
  RubricValue,
} from '../../common/types/grade';
import { readRubricLiteral, RubricLiteralError } from '../parsing/rubric-literal';

/**
 * Everything the annotation passes read from the grades
 */
export interface GradeTables {
  records: GradeRecord[];
  /** question number -> "score/total" */
  scores: Map<string, string>;
  /** question number -> comment, non-empty comments only */
  comments: Map<string, string>;
  /** Evidence lines of every row, in row order */
  correctLines: string[];
  /** One phrase group per row that has phrases */
  phraseGroups: string[][];
}

type Scalar = string | number;

function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstNumber(text: string | null | undefined): string | undefined {
  return text ? /\d+(?:\.\d+)?/.exec(text)?.[0] : undefined;
}

function toRubricValue(item: unknown): RubricValue {
  if (Array.isArray(item)) {
    return item.map(toRubricValue);
  }
  if (
    typeof item === 'string' ||
    typeof item === 'number' ||
    typeof item === 'boolean'
  ) {
    return item;
  }
  return null;
}

/**
 * Resolve a rubric cell to a list or a scalar
 * Numbers and booleans become their text; list members that are neither
 * text, numbers, booleans nor lists become null.
 * @returns undefined for a missing, blank or object cell
 */
export function parseRubricCell(raw: RubricCellInput): RubricCell | undefined {
  if (Array.isArray(raw)) {
    return { kind: 'list', items: raw.map(toRubricValue) };
  }
  if (typeof raw === 'number' || typeof raw === 'boolean') {
    return { kind: 'scalar', text: String(raw) };
  }
  if (typeof raw !== 'string') {
    return undefined;
  }

  const text = raw.trim();
  if (!text) {
    return undefined;
  }

  let decoded: RubricValue;
  try {
    decoded = readRubricLiteral(text);
  } catch (error) {
    if (error instanceof RubricLiteralError) {
      return { kind: 'scalar', text };
    }
    throw error;
  }

  if (Array.isArray(decoded)) {
    return { kind: 'list', items: decoded };
  }
  if (typeof decoded === 'string') {
    return { kind: 'scalar', text: decoded.trim() };
  }
  return decoded === null ? undefined : { kind: 'scalar', text };
}

@Injectable()
export class GradeIngestionService {
  private readonly logger = new Logger(GradeIngestionService.name);

  /**
   * Load grade rows from a JSON file holding an array of rows or { grades: [...] }
   * @param gradesPath JSON file path
   * @returns Valid rows; malformed rows are logged and left out
   */
  async loadRows(gradesPath: string): Promise<GradeRow[]> {
    const content = await fs.readFile(gradesPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    const rows = isRecord(parsed) ? parsed.grades : parsed;
    if (!Array.isArray(rows)) {
      throw new Error(`${gradesPath} does not contain a list of grades`);
    }

    const valid: GradeRow[] = [];
    rows.forEach((row: unknown, index) => {
      const gradeRow = this.toGradeRow(row);
      if (gradeRow) {
        valid.push(gradeRow);
      } else {
        this.logger.warn(`Skipping malformed grade row ${index} in ${gradesPath}`);
      }
    });

    this.logger.log(`Loaded ${valid.length} grading records from ${gradesPath}`);
    return valid;
  }

  /**
   * Build score and comment tables plus the evidence lists
   * @param rows Grade rows in grading order
   * @param modelAnswers Questions to backfill when no row grades them
   */
  ingest(rows: GradeRow[], modelAnswers: ModelAnswerEntry[] = []): GradeTables {
    const allRows = [...rows, ...this.backfillRows(rows, modelAnswers)];
    const records = allRows.map((row) => this.toRecord(row));

    const scores = new Map<string, string>();
    const comments = new Map<string, string>();
    for (const record of records) {
      scores.set(record.questionNumber, `${record.score}/${record.totalMarks}`);
      if (record.comment) {
        comments.set(record.questionNumber, record.comment);
      } else {
        comments.delete(record.questionNumber);
      }
    }

    const correctLines = records.flatMap((record) => record.correctLines);
    const phraseGroups = records
      .map((record) => record.correctWords)
      .filter((group) => group.length > 0);

    this.logger.log(
      `Ingested ${records.length} grades: ${scores.size} scores, ${comments.size} comments, ` +
        `${correctLines.length} correct lines, ${phraseGroups.length} phrase groups`,
    );
    return { records, scores, comments, correctLines, phraseGroups };
  }

  /**
   * One flat ordered list of non-empty trimmed lines
   */
  flattenLines(cells: Array<RubricCell | undefined>): string[] {
    const lines: string[] = [];
    const visit = (value: RubricValue): void => {
      if (Array.isArray(value)) {
        value.forEach(visit);
      } else if (typeof value === 'string') {
        const line = value.trim();
        if (line) {
          lines.push(line);
        }
      } else {
        this.logger.debug(`Skipping non-text rubric entry: ${String(value)}`);
      }
    };

    for (const cell of cells) {
      if (!cell) {
        continue;
      }
      if (cell.kind === 'list') {
        cell.items.forEach(visit);
      } else if (cell.text) {
        lines.push(cell.text);
      }
    }
    return lines;
  }

  toRecord(row: GradeRow): GradeRecord {
    return {
      questionNumber: String(row.question_number).trim(),
      score: String(row.score).trim(),
      totalMarks: String(row.total_marks).trim(),
      comment: String(row.comment ?? '').trim(),
      correctLines: this.flattenLines([parseRubricCell(row.correct_lines)]),
      correctWords: this.flattenLines([parseRubricCell(row.correct_words)]),
    };
  }

  /**
   * Rows for leaf questions of the model answers that nobody graded
   */
  backfillRows(rows: GradeRow[], modelAnswers: ModelAnswerEntry[]): GradeRow[] {
    const graded = new Set(rows.map((row) => String(row.question_number).trim()));
    const missing: GradeRow[] = [];

    const visit = (entry: ModelAnswerEntry): void => {
      if (entry.sub_answers && entry.sub_answers.length > 0) {
        entry.sub_answers.forEach(visit);
        return;
      }
      const questionNumber = entry.question_number.trim();
      if (!questionNumber || graded.has(questionNumber)) {
        return;
      }
      graded.add(questionNumber);
      missing.push({
        question_number: questionNumber,
        score: '0',
        total_marks:
          firstNumber(entry.maximum_marks) ??
          firstNumber(entry.total_marks_available) ??
          '0',
        comment: NO_ANSWER_COMMENT,
      });
    };
    modelAnswers.forEach(visit);

    if (missing.length > 0) {
      this.logger.log(
        `Added ${missing.length} unanswered questions: ${missing
          .map((row) => row.question_number)
          .join(', ')}`,
      );
    }
    return missing;
  }

  private toGradeRow(value: unknown): GradeRow | undefined {
    if (!isRecord(value)) {
      return undefined;
    }
    const {
      question_number: questionNumber,
      score,
      total_marks: totalMarks,
      comment,
      correct_lines: correctLines,
      correct_words: correctWords,
    } = value;

    if (!isScalar(questionNumber) || !isScalar(score) || !isScalar(totalMarks)) {
      return undefined;
    }
    return {
      question_number: questionNumber,
      score,
      total_marks: totalMarks,
      comment: isScalar(comment) ? comment : undefined,
      correct_lines: correctLines,
      correct_words: correctWords,
    };
  }
}
