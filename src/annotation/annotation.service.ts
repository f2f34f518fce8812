/**
 * Annotation Service
 * Drives one annotation run: scores and comments per page, underlines,
 * then ticks over the whole document, then saves
 */

import { promises as fs } from 'fs';
import * as path from 'path';

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DEFAULT_OUTPUT_DIR } from '../common/constants';
import type { GradeRow } from '../common/types/grade';
import { errorMessage } from '../common/types/result';
import type {
  AnnotatableDocument,
  DocumentPage,
} from '../pdf/interfaces/annotatable-document.interface';
import { PdfDocumentService } from '../pdf/services/pdf-document.service';

import { AnnotationLayoutService } from './services/annotation-layout.service';
import { EvidenceLocatorService } from './services/evidence-locator.service';
import {
  GradeIngestionService,
  type GradeTables,
} from './services/grade-ingestion.service';
import { QuestionSpanLocatorService } from './services/question-span-locator.service';
import {
  createReport,
  type AnnotationReport,
  type AnnotationRequest,
  type AnnotationResult,
  type AnnotationState,
} from './types/annotation.types';

class AnnotationAbort extends Error {}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

@Injectable()
export class AnnotationService {
  private readonly logger = new Logger(AnnotationService.name);
  private readonly outputDir: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly pdfDocumentService: PdfDocumentService,
    private readonly gradeIngestionService: GradeIngestionService,
    private readonly questionSpanLocatorService: QuestionSpanLocatorService,
    private readonly evidenceLocatorService: EvidenceLocatorService,
    private readonly annotationLayoutService: AnnotationLayoutService,
  ) {
    this.outputDir =
      this.configService.get<string>('annotation.outputDir') ?? DEFAULT_OUTPUT_DIR;
  }

  /**
   * Path of the annotated copy of a student's script
   * @throws when the name would leave the output directory
   */
  outputPathFor(studentName: string, outputDir: string = this.outputDir): string {
    const student = studentName.trim().toLowerCase();
    if (/[\\/]/.test(student) || student.includes('..')) {
      throw new AnnotationAbort(
        `Student name must not contain path separators or '..': ${studentName}`,
      );
    }
    return path.join(outputDir, student, `${student}_annotated.pdf`);
  }

  /**
   * Annotate one student's script
   * @returns success with the output path, or the reason the run stopped
   */
  async annotate(request: AnnotationRequest): Promise<AnnotationResult> {
    const report = createReport();
    let state: AnnotationState = 'loading';
    const enter = (next: AnnotationState): void => {
      this.logger.debug(`State ${state} -> ${next}`);
      state = next;
    };
    const abort = (reason: string): AnnotationResult => {
      this.logger.error(`Annotation aborted while ${state}: ${reason}`);
      return { success: false, reason, report, state: 'aborted' };
    };

    this.logger.log(`Starting annotation of ${request.inputPdfPath}`);

    let tables: GradeTables;
    let outputPath: string;
    try {
      if (!request.studentName.trim()) {
        throw new AnnotationAbort('Student name is required');
      }
      outputPath = this.outputPathFor(request.studentName, request.outputDir);
      if (!(await exists(request.inputPdfPath))) {
        throw new AnnotationAbort(`Input PDF not found: ${request.inputPdfPath}`);
      }
      const rows = await this.resolveRows(request);
      tables = this.gradeIngestionService.ingest(rows, request.modelAnswers);
    } catch (error) {
      return abort(errorMessage(error));
    }

    let document: AnnotatableDocument;
    try {
      document = await this.pdfDocumentService.open(request.inputPdfPath);
    } catch (error) {
      return abort(`Error opening PDF: ${errorMessage(error)}`);
    }

    try {
      for (let index = 0; index < document.pageCount; index++) {
        const page = document.page(index);
        enter('per-page-scoring');
        this.scorePage(document, page, tables, report);
        if (tables.phraseGroups.length > 0) {
          enter('correct-words-pass');
          this.underlinePage(page, tables.phraseGroups, report);
        }
        report.pagesProcessed++;
      }

      if (tables.correctLines.length > 0) {
        enter('correct-lines-pass');
        this.tickLines(document, tables.correctLines, report);
      }

      enter('saving');
      await this.save(document, outputPath);
    } catch (error) {
      return abort(errorMessage(error));
    } finally {
      await document.close().catch((error: unknown) => {
        this.logger.warn(`Failed to close document: ${errorMessage(error)}`);
      });
    }

    enter('done');
    this.logger.log(
      `Annotation completed for ${request.studentName}: ${report.scoresPlaced} scores, ` +
        `${report.commentsPlaced} comments, ${report.ticksPlaced} ticks, ` +
        `${report.underlinesDrawn} underlines, ${report.issues.length} issues. Saved as ${outputPath}`,
    );
    return { success: true, outputPath, report, state: 'done' };
  }

  private async resolveRows(request: AnnotationRequest): Promise<GradeRow[]> {
    let rows: GradeRow[];
    if (request.grades) {
      rows = request.grades;
    } else if (request.gradesPath) {
      if (!(await exists(request.gradesPath))) {
        throw new AnnotationAbort(`Grades file not found: ${request.gradesPath}`);
      }
      try {
        rows = await this.gradeIngestionService.loadRows(request.gradesPath);
      } catch (error) {
        throw new AnnotationAbort(`Error loading grades: ${errorMessage(error)}`);
      }
    } else {
      throw new AnnotationAbort('No grades supplied');
    }

    if (rows.length === 0) {
      throw new AnnotationAbort('Grades are empty');
    }
    return rows;
  }

  private scorePage(
    document: AnnotatableDocument,
    page: DocumentPage,
    tables: GradeTables,
    report: AnnotationReport,
  ): void {
    const { spans, unresolved } = this.questionSpanLocatorService.locate(page);
    for (const label of unresolved) {
      report.issues.push({
        kind: 'label',
        pageIndex: page.index,
        subject: label,
        reason: 'label not found on page',
      });
    }

    const scored = new Set<string>();
    for (const span of spans) {
      const score = tables.scores.get(span.label);
      if (!span.scoreEligible) {
        this.logger.debug(`Skipping ${span.label} on a marks line: '${span.lineText}'`);
      } else if (score !== undefined && !scored.has(span.label)) {
        const result = this.annotationLayoutService.placeScore(page, span.rect, score);
        if (result.ok) {
          scored.add(span.label);
          report.scoresPlaced++;
        } else {
          this.logger.warn(
            `Failed to place score for ${span.label} on page ${page.index + 1}: ${result.reason}`,
          );
          report.issues.push({
            kind: 'score',
            pageIndex: page.index,
            subject: span.label,
            reason: result.reason,
          });
        }
      }

      const comment = tables.comments.get(span.label);
      if (comment === undefined) {
        continue;
      }
      const placement = this.annotationLayoutService.placeComment(
        document,
        page,
        span.extent,
        comment,
      );
      if (placement.linesDrawn > 0) {
        report.commentsPlaced++;
      }
      if (placement.truncated) {
        report.commentsTruncated++;
      }
      for (const reason of placement.failures) {
        report.issues.push({
          kind: 'comment',
          pageIndex: page.index,
          subject: span.label,
          reason,
        });
      }
    }
  }

  private underlinePage(
    page: DocumentPage,
    phraseGroups: string[][],
    report: AnnotationReport,
  ): void {
    for (const group of phraseGroups) {
      for (const phrase of group) {
        const placement = this.annotationLayoutService.underlineOccurrences(page, phrase);
        report.underlinesDrawn += placement.drawn;
        for (const reason of placement.failures) {
          report.issues.push({
            kind: 'underline',
            pageIndex: page.index,
            subject: phrase,
            reason,
          });
        }
      }
    }
  }

  private tickLines(
    document: AnnotatableDocument,
    lines: string[],
    report: AnnotationReport,
  ): void {
    this.logger.log(`Matching ${lines.length} correct lines across the document`);
    const context = this.evidenceLocatorService.createContext();

    for (const line of lines) {
      const match = this.evidenceLocatorService.locate(document, line, context);
      if (
        !match.matched ||
        match.pageIndex === undefined ||
        match.rect === undefined ||
        match.positionKey === undefined
      ) {
        report.linesUnmatched++;
        report.issues.push({ kind: 'line', subject: line, reason: 'no match' });
        continue;
      }

      report.linesMatched++;
      if (match.duplicate) {
        this.logger.debug(
          `Tick already present near y=${match.positionKey} on page ${match.pageIndex + 1}`,
        );
        report.duplicateTicks++;
        continue;
      }

      const result = this.annotationLayoutService.placeTick(
        document.page(match.pageIndex),
        match.rect,
      );
      if (result.ok) {
        this.evidenceLocatorService.registerTick(
          context,
          match.pageIndex,
          match.positionKey,
        );
        report.ticksPlaced++;
      } else {
        this.logger.warn(`Error inserting tick for '${match.searchText}': ${result.reason}`);
        report.issues.push({
          kind: 'tick',
          pageIndex: match.pageIndex,
          subject: line,
          reason: result.reason,
        });
      }
    }

    this.logger.log(
      `Completed line matching: ${report.linesMatched}/${lines.length} matched, ${report.ticksPlaced} ticks`,
    );
  }

  /**
   * Write beside the target and rename, so a failed save leaves nothing at
   * the output path
   */
  private async save(document: AnnotatableDocument, outputPath: string): Promise<void> {
    const tempPath = `${outputPath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await document.save(tempPath);
      await fs.rename(tempPath, outputPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(
          `Failed to remove ${tempPath}: ${errorMessage(cleanupError)}`,
        );
      });
      throw new AnnotationAbort(
        `Error saving annotated PDF to ${outputPath}: ${errorMessage(error)}`,
      );
    }
  }
}
