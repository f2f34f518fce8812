/**
 * Annotatable document contract
 * Text, search and drawing primitives the annotation engine relies on
 */

import type { Point, Rect } from '../../common/types/geometry';
import type { RgbColor } from '../../common/types/layout';
import type { OperationResult } from '../../common/types/result';

/**
 * helvetica: body text; symbol: dingbat glyphs such as the tick
 */
export type DocumentFont = 'helvetica' | 'symbol';

export interface TextStyle {
  font: DocumentFont;
  fontSize: number;
  color: RgbColor;
}

export interface LineStyle {
  thickness: number;
  color: RgbColor;
}

export interface DocumentPage {
  /** 0-based page index */
  readonly index: number;
  readonly width: number;
  readonly height: number;

  /**
   * Plain page text, one visual line per `\n`
   */
  getText(): string;

  /**
   * Verbatim, case-sensitive search. Every non-overlapping occurrence in
   * reading order; an occurrence wrapped over lines yields one rect per line.
   */
  search(text: string): Rect[];

  /**
   * Draw text with its baseline starting at `point`
   */
  insertText(point: Point, text: string, style: TextStyle): OperationResult;

  drawLine(from: Point, to: Point, style: LineStyle): OperationResult;
}

export interface AnnotatableDocument {
  readonly pageCount: number;

  page(index: number): DocumentPage;

  /**
   * Width of `text` in points using the font's glyph metrics
   */
  measureText(text: string, fontSize: number, font?: DocumentFont): number;

  save(outputPath: string): Promise<void>;

  close(): Promise<void>;
}
