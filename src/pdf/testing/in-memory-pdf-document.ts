/**
 * In-memory annotatable document for tests
 * Real text index for search, drawing recorded instead of rendered
 */

import { promises as fs } from 'fs';

import type { Point, Rect } from '../../common/types/geometry';
import { OK, failure, type OperationResult } from '../../common/types/result';
import type {
  AnnotatableDocument,
  DocumentFont,
  DocumentPage,
  LineStyle,
  TextStyle,
} from '../interfaces/annotatable-document.interface';
import { PageTextIndex, type PageLayout } from '../layout/page-text-index';

export type DrawOperation =
  | {
      type: 'text';
      pageIndex: number;
      point: Point;
      text: string;
      style: TextStyle;
    }
  | {
      type: 'line';
      pageIndex: number;
      from: Point;
      to: Point;
      style: LineStyle;
    };

export interface InMemoryDocumentOptions {
  /** Width per character as a share of the font size */
  charWidthRatio?: number;
  /** Return a reason to make a drawing call fail */
  failDraw?: (operation: DrawOperation) => string | undefined;
  /** Make save fail with this message */
  failSave?: string;
}

class InMemoryPage implements DocumentPage {
  private readonly textIndex: PageTextIndex;
  readonly width: number;
  readonly height: number;
  searchCalls: string[] = [];

  constructor(
    readonly index: number,
    layout: PageLayout,
    private readonly record: (operation: DrawOperation) => OperationResult,
  ) {
    this.width = layout.width;
    this.height = layout.height;
    this.textIndex = new PageTextIndex(layout.items);
  }

  getText(): string {
    return this.textIndex.text;
  }

  search(text: string): Rect[] {
    this.searchCalls.push(text);
    return this.textIndex.search(text);
  }

  insertText(point: Point, text: string, style: TextStyle): OperationResult {
    return this.record({
      type: 'text',
      pageIndex: this.index,
      point,
      text,
      style,
    });
  }

  drawLine(from: Point, to: Point, style: LineStyle): OperationResult {
    return this.record({ type: 'line', pageIndex: this.index, from, to, style });
  }
}

export class InMemoryPdfDocument implements AnnotatableDocument {
  readonly operations: DrawOperation[] = [];
  readonly pages: InMemoryPage[];
  savedTo?: string;
  closed = false;

  constructor(
    layouts: PageLayout[],
    private readonly options: InMemoryDocumentOptions = {},
  ) {
    this.pages = layouts.map(
      (layout, index) =>
        new InMemoryPage(index, layout, (operation) => this.record(operation)),
    );
  }

  get pageCount(): number {
    return this.pages.length;
  }

  page(index: number): DocumentPage {
    const page = this.pages[index];
    if (!page) {
      throw new RangeError(`Page ${index} out of range`);
    }
    return page;
  }

  measureText(text: string, fontSize: number, _font?: DocumentFont): number {
    return text.length * fontSize * (this.options.charWidthRatio ?? 0.5);
  }

  async save(outputPath: string): Promise<void> {
    if (this.options.failSave) {
      throw new Error(this.options.failSave);
    }
    await fs.writeFile(outputPath, JSON.stringify(this.operations));
    this.savedTo = outputPath;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  textOperations(): Array<Extract<DrawOperation, { type: 'text' }>> {
    return this.operations.flatMap((op) => (op.type === 'text' ? [op] : []));
  }

  lineOperations(): Array<Extract<DrawOperation, { type: 'line' }>> {
    return this.operations.flatMap((op) => (op.type === 'line' ? [op] : []));
  }

  private record(operation: DrawOperation): OperationResult {
    const reason = this.options.failDraw?.(operation);
    if (reason) {
      return failure(reason);
    }
    this.operations.push(operation);
    return OK;
  }
}

/**
 * A page whose lines are laid out as runs of fixed-width characters
 * @param lines Text and top edge of each line
 * @param charWidth Width of every character
 */
export function fixedWidthPage(
  lines: Array<{ text: string; y: number; x?: number }>,
  options: { width?: number; height?: number; charWidth?: number; lineHeight?: number } = {},
): PageLayout {
  const charWidth = options.charWidth ?? 5;
  const lineHeight = options.lineHeight ?? 10;
  return {
    width: options.width ?? 600,
    height: options.height ?? 800,
    items: lines.map((line) => ({
      str: line.text,
      x: line.x ?? 72,
      y: line.y,
      width: line.text.length * charWidth,
      height: lineHeight,
    })),
  };
}
