/**
 * Annotation Layout Service
 * Places scores, wrapped comments, ticks and underlines on a page
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DEFAULT_LAYOUT } from '../../common/constants';
import type { Rect } from '../../common/types/geometry';
import type { AnnotationLayoutConfig } from '../../common/types/layout';
import type { OperationResult } from '../../common/types/result';
import type {
  AnnotatableDocument,
  DocumentPage,
} from '../../pdf/interfaces/annotatable-document.interface';

export interface CommentPlacement {
  linesDrawn: number;
  totalLines: number;
  truncated: boolean;
  failures: string[];
}

export interface UnderlinePlacement {
  occurrences: number;
  drawn: number;
  failures: string[];
}

@Injectable()
export class AnnotationLayoutService {
  private readonly logger = new Logger(AnnotationLayoutService.name);
  readonly layout: AnnotationLayoutConfig;

  constructor(private readonly configService: ConfigService) {
    this.layout =
      this.configService.get<AnnotationLayoutConfig>('annotation.layout') ??
      DEFAULT_LAYOUT;
  }

  /**
   * Greedy word wrap by measured width. A word wider than the column gets a
   * line of its own.
   */
  wrapText(
    document: AnnotatableDocument,
    text: string,
    maxWidth: number,
    fontSize: number,
  ): string[] {
    const lines: string[] = [];
    let current = '';
    for (const word of text.split(/\s+/).filter(Boolean)) {
      const candidate = current ? `${current} ${word}` : word;
      if (document.measureText(candidate, fontSize, 'helvetica') <= maxWidth) {
        current = candidate;
      } else {
        if (current) {
          lines.push(current);
        }
        current = word;
      }
    }
    if (current) {
      lines.push(current);
    }
    return lines;
  }

  /**
   * Score text to the left of the question label
   */
  placeScore(page: DocumentPage, labelRect: Rect, scoreText: string): OperationResult {
    const { score } = this.layout;
    const point = { x: labelRect.x0 + score.offsetX, y: labelRect.y0 + score.offsetY };
    const result = page.insertText(point, scoreText, {
      font: 'helvetica',
      fontSize: score.fontSize,
      color: score.color,
    });
    if (result.ok) {
      this.logger.debug(
        `Placed score ${scoreText} at (${point.x.toFixed(2)}, ${point.y.toFixed(2)}) on page ${page.index + 1}`,
      );
    }
    return result;
  }

  /**
   * Comment wrapped into the right-hand column, starting at the span's top
   * and clipped above its bottom
   */
  placeComment(
    document: AnnotatableDocument,
    page: DocumentPage,
    extent: { top: number; bottom: number },
    comment: string,
  ): CommentPlacement {
    const { comment: style } = this.layout;
    const x = page.width - style.width;
    const lineHeight = style.fontSize + style.lineSpacing;
    const yLimit = extent.bottom - style.bottomMargin;
    const lines = this.wrapText(document, comment, style.width, style.fontSize);

    const placement: CommentPlacement = {
      linesDrawn: 0,
      totalLines: lines.length,
      truncated: false,
      failures: [],
    };

    for (let i = 0; i < lines.length; i++) {
      const y = extent.top + i * lineHeight;
      if (y + lineHeight > yLimit) {
        this.logger.warn(
          `Reached y_limit=${yLimit.toFixed(2)} on page ${page.index + 1}, ` +
            `truncating comment after ${i}/${lines.length} lines`,
        );
        placement.truncated = true;
        break;
      }
      const result = page.insertText({ x, y }, lines[i], {
        font: 'helvetica',
        fontSize: style.fontSize,
        color: style.color,
      });
      if (result.ok) {
        placement.linesDrawn++;
      } else {
        this.logger.warn(
          `Failed to draw comment line ${i + 1} on page ${page.index + 1}: ${result.reason}`,
        );
        placement.failures.push(result.reason);
      }
    }

    this.logger.debug(
      `Inserted ${placement.linesDrawn}/${lines.length} comment lines at x=${x.toFixed(2)}, ` +
        `y_start=${extent.top.toFixed(2)}, clipped at y_limit=${yLimit.toFixed(2)}`,
    );
    return placement;
  }

  /**
   * Tick left of and below the first word of a matched line
   */
  placeTick(page: DocumentPage, rect: Rect): OperationResult {
    const { tick } = this.layout;
    const point = {
      x: Math.max(tick.minX, rect.x0 + tick.offsetX),
      y: rect.y0 + tick.offsetY,
    };
    const result = page.insertText(point, tick.glyph, {
      font: 'symbol',
      fontSize: tick.fontSize,
      color: tick.color,
    });
    if (result.ok) {
      this.logger.debug(
        `Inserted tick at (${point.x.toFixed(2)}, ${point.y.toFixed(2)}) on page ${page.index + 1}`,
      );
    }
    return result;
  }

  /**
   * Underline every occurrence of a phrase on the page
   */
  underlineOccurrences(page: DocumentPage, phrase: string): UnderlinePlacement {
    const text = phrase.trim();
    const placement: UnderlinePlacement = { occurrences: 0, drawn: 0, failures: [] };
    if (!text) {
      return placement;
    }

    const rects = page.search(text);
    placement.occurrences = rects.length;
    if (rects.length === 0) {
      this.logger.debug(`No exact match for phrase '${text}' on page ${page.index + 1}`);
      return placement;
    }

    const { underline } = this.layout;
    for (const rect of rects) {
      const y = rect.y1 + underline.offsetY;
      const result = page.drawLine({ x: rect.x0, y }, { x: rect.x1, y }, {
        thickness: underline.thickness,
        color: underline.color,
      });
      if (result.ok) {
        placement.drawn++;
      } else {
        this.logger.warn(
          `Error underlining '${text}' on page ${page.index + 1}: ${result.reason}`,
        );
        placement.failures.push(result.reason);
      }
    }
    return placement;
  }
}
