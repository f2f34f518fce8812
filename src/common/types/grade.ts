/**
 * Grading types
 * Output contract of the external grading step
 */

/**
 * A rubric cell as it arrives: usually a literal-list encoding, a bare string
 * or an already decoded list, but any JSON value is accepted and resolved by
 * parseRubricCell
 */
export type RubricCellInput = unknown;

/**
 * One graded question
 */
export interface GradeRow {
  question_number: string | number;
  score: string | number;
  total_marks: string | number;
  comment?: string | number | null;
  correct_lines?: RubricCellInput;
  correct_words?: RubricCellInput;
}

/**
 * A rubric cell resolved once at ingestion
 */
export type RubricCell =
  | { kind: 'list'; items: RubricValue[] }
  | { kind: 'scalar'; text: string };

/**
 * Decoded literal: strings, numbers, booleans, null and nested lists
 */
export type RubricValue = string | number | boolean | null | RubricValue[];

/**
 * Normalized grade record
 */
export interface GradeRecord {
  questionNumber: string;
  score: string;
  totalMarks: string;
  comment: string;
  correctLines: string[];
  /** Phrases to underline, in row order */
  correctWords: string[];
}

/**
 * Model answer entry produced by the extraction step
 */
export interface ModelAnswerEntry {
  question_number: string;
  answer?: string | null;
  marking_criteria?: string | null;
  total_marks_available?: string | null;
  maximum_marks?: string | null;
  sub_answers?: ModelAnswerEntry[] | null;
}

export interface ModelAnswerExtraction {
  question_title?: string;
  description?: string | null;
  answers: ModelAnswerEntry[];
  total_marks?: string | null;
}
