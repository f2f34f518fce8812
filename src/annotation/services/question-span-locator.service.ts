/**
 * Question-Span Locator Service
 * Finds question labels on a page and the vertical band each one owns
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DEFAULT_SPAN_STOP_WORDS } from '../../common/constants';
import type { Rect } from '../../common/types/geometry';
import type { DocumentPage } from '../../pdf/interfaces/annotatable-document.interface';

/**
 * "1.2", "3.10(a)"; never part of a longer number
 */
const QUESTION_LABEL_PATTERN = /(?<!\d)\d+\.\d+(?:\([a-z]\))?(?!\d)/g;

export interface QuestionSpan {
  label: string;
  rect: Rect;
  anchorY: number;
  /** Offsets of the label in the page text */
  startOffset: number;
  endOffset: number;
  /** [top, bottom): from this label to the next one or the page bottom */
  extent: { top: number; bottom: number };
  /** The page text line holding the label */
  lineText: string;
  /** False on marks-tally lines */
  scoreEligible: boolean;
}

export interface SpanScan {
  spans: QuestionSpan[];
  /** Labels found in the text but not on the page */
  unresolved: string[];
}

@Injectable()
export class QuestionSpanLocatorService {
  private readonly logger = new Logger(QuestionSpanLocatorService.name);
  private readonly stopWords: string[];

  constructor(private readonly configService: ConfigService) {
    this.stopWords = (
      this.configService.get<string[]>('annotation.spans.stopWords') ??
      DEFAULT_SPAN_STOP_WORDS
    ).map((word) => word.toLowerCase());
  }

  /**
   * Scan one page for question labels
   * @returns Spans sorted top to bottom
   */
  locate(page: DocumentPage): SpanScan {
    const text = page.getText();
    const hitsByLabel = new Map<string, Rect[]>();
    const seenByLabel = new Map<string, number>();
    const unresolved: string[] = [];
    const found: Array<Omit<QuestionSpan, 'extent'>> = [];

    for (const match of text.matchAll(QUESTION_LABEL_PATTERN)) {
      const label = match[0];
      const start = match.index ?? 0;
      const occurrence = seenByLabel.get(label) ?? 0;
      seenByLabel.set(label, occurrence + 1);

      let hits = hitsByLabel.get(label);
      if (!hits) {
        hits = page.search(label);
        hitsByLabel.set(label, hits);
      }
      if (hits.length === 0) {
        this.logger.warn(
          `Could not find position for ${label} on page ${page.index + 1}`,
        );
        unresolved.push(label);
        continue;
      }

      const rect = hits[Math.min(occurrence, hits.length - 1)];
      const lineText = this.lineAround(text, start);
      const lowered = lineText.toLowerCase();
      found.push({
        label,
        rect,
        anchorY: rect.y0,
        startOffset: start,
        endOffset: start + label.length,
        lineText,
        scoreEligible: !this.stopWords.some((word) => lowered.includes(word)),
      });
    }

    // Stable sort: labels sharing a y keep text order
    found.sort((a, b) => a.anchorY - b.anchorY);

    const spans = found.map((span, i) => ({
      ...span,
      extent: {
        top: span.anchorY,
        bottom: i + 1 < found.length ? found[i + 1].anchorY : page.height,
      },
    }));

    this.logger.debug(
      `Page ${page.index + 1}: ${spans.length} question spans (${spans
        .map((span) => `${span.label}@${span.anchorY.toFixed(2)}`)
        .join(', ')})`,
    );
    return { spans, unresolved };
  }

  private lineAround(text: string, offset: number): string {
    const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
    const newline = text.indexOf('\n', offset);
    const lineEnd = newline === -1 ? text.length : newline;
    return text.slice(lineStart, lineEnd).trim();
  }
}
