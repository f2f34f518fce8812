/**
 * Annotation run types
 */

import type { GradeRow, ModelAnswerEntry } from '../../common/types/grade';

export type AnnotationState =
  | 'loading'
  | 'per-page-scoring'
  | 'correct-words-pass'
  | 'correct-lines-pass'
  | 'saving'
  | 'done'
  | 'aborted';

export type AnnotationIssueKind =
  | 'label'
  | 'score'
  | 'comment'
  | 'underline'
  | 'line'
  | 'tick';

/**
 * One local failure; never stops the run
 */
export interface AnnotationIssue {
  kind: AnnotationIssueKind;
  /** 0-based page, when the failure belongs to one */
  pageIndex?: number;
  /** Label, phrase or line concerned */
  subject: string;
  reason: string;
}

export interface AnnotationReport {
  pagesProcessed: number;
  scoresPlaced: number;
  commentsPlaced: number;
  commentsTruncated: number;
  underlinesDrawn: number;
  linesMatched: number;
  linesUnmatched: number;
  ticksPlaced: number;
  duplicateTicks: number;
  issues: AnnotationIssue[];
}

export function createReport(): AnnotationReport {
  return {
    pagesProcessed: 0,
    scoresPlaced: 0,
    commentsPlaced: 0,
    commentsTruncated: 0,
    underlinesDrawn: 0,
    linesMatched: 0,
    linesUnmatched: 0,
    ticksPlaced: 0,
    duplicateTicks: 0,
    issues: [],
  };
}

export interface AnnotationRequest {
  inputPdfPath: string;
  /** Names the output directory and file, lower-cased */
  studentName: string;
  /** Defaults to the configured output directory */
  outputDir?: string;
  /** Grade rows; takes precedence over gradesPath */
  grades?: GradeRow[];
  /** JSON file holding the grade rows */
  gradesPath?: string;
  /** Questions with no grade row are added as unanswered */
  modelAnswers?: ModelAnswerEntry[];
}

export interface AnnotationResult {
  success: boolean;
  outputPath?: string;
  reason?: string;
  report: AnnotationReport;
  /** 'done' or 'aborted' */
  state: AnnotationState;
}
