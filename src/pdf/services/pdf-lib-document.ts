/**
 * pdf-lib backed document
 * Drawing surface for annotations, searchable through the page text index
 */

import { promises as fs } from 'fs';

import {
  type PDFDocument,
  type PDFFont,
  type PDFPage,
  StandardFonts,
  rgb,
} from 'pdf-lib';

import type { Point, Rect } from '../../common/types/geometry';
import {
  OK,
  errorMessage,
  failure,
  type OperationResult,
} from '../../common/types/result';
import type {
  AnnotatableDocument,
  DocumentFont,
  DocumentPage,
  LineStyle,
  TextStyle,
} from '../interfaces/annotatable-document.interface';
import { PageTextIndex, type PageLayout } from '../layout/page-text-index';

const SYMBOL_REPLACEMENTS: Record<string, string> = {
  '“': '"',
  '”': '"',
  '‘': "'",
  '’': "'",
  '–': '-',
  '—': '-',
  '−': '-',
  '…': '...',
  '×': 'x',
  '÷': '/',
  '≤': '<=',
  '≥': '>=',
  '≈': '~',
  '→': '->',
  '←': '<-',
  '•': '-',
};

/**
 * Map text onto what the standard Helvetica encoding can draw
 */
export function toWinAnsi(text: string): string {
  return text
    .replace(/[\r\n\t]+/g, ' ')
    .replace(/[^\x20-\x7E\xA0-\xFF]/g, (ch) => SYMBOL_REPLACEMENTS[ch] ?? ' ');
}

class PdfLibPage implements DocumentPage {
  private readonly textIndex: PageTextIndex;
  private readonly origin: { x: number; top: number };
  readonly width: number;
  readonly height: number;

  constructor(
    readonly index: number,
    private readonly page: PDFPage,
    layout: PageLayout | undefined,
    private readonly fonts: Record<DocumentFont, PDFFont>,
  ) {
    // Text positions are measured from the crop box, so drawing is too
    const box = page.getCropBox();
    this.width = box.width;
    this.height = box.height;
    this.origin = { x: box.x, top: box.y + box.height };
    this.textIndex = new PageTextIndex(layout?.items ?? []);
  }

  getText(): string {
    return this.textIndex.text;
  }

  search(text: string): Rect[] {
    return this.textIndex.search(text);
  }

  insertText(point: Point, text: string, style: TextStyle): OperationResult {
    const rendered = style.font === 'helvetica' ? toWinAnsi(text) : text;
    try {
      this.page.drawText(rendered, {
        x: this.origin.x + point.x,
        y: this.origin.top - point.y,
        size: style.fontSize,
        font: this.fonts[style.font],
        color: rgb(style.color.r, style.color.g, style.color.b),
      });
      return OK;
    } catch (error) {
      return failure(`drawText failed: ${errorMessage(error)}`);
    }
  }

  drawLine(from: Point, to: Point, style: LineStyle): OperationResult {
    try {
      this.page.drawLine({
        start: { x: this.origin.x + from.x, y: this.origin.top - from.y },
        end: { x: this.origin.x + to.x, y: this.origin.top - to.y },
        thickness: style.thickness,
        color: rgb(style.color.r, style.color.g, style.color.b),
      });
      return OK;
    } catch (error) {
      return failure(`drawLine failed: ${errorMessage(error)}`);
    }
  }
}

export class PdfLibDocument implements AnnotatableDocument {
  private closed = false;

  private constructor(
    private readonly pdf: PDFDocument,
    private readonly fonts: Record<DocumentFont, PDFFont>,
    private readonly pages: PdfLibPage[],
  ) {}

  /**
   * Wrap a loaded pdf-lib document
   * @param pdf Loaded document
   * @param layouts Text layout per page, in page order
   */
  static async create(
    pdf: PDFDocument,
    layouts: PageLayout[],
  ): Promise<PdfLibDocument> {
    const fonts: Record<DocumentFont, PDFFont> = {
      helvetica: await pdf.embedFont(StandardFonts.Helvetica),
      symbol: await pdf.embedFont(StandardFonts.ZapfDingbats),
    };
    const pages = pdf
      .getPages()
      .map((page, index) => new PdfLibPage(index, page, layouts[index], fonts));
    return new PdfLibDocument(pdf, fonts, pages);
  }

  get pageCount(): number {
    return this.pages.length;
  }

  page(index: number): DocumentPage {
    const page = this.pages[index];
    if (!page) {
      throw new RangeError(
        `Page ${index} out of range (document has ${this.pages.length} pages)`,
      );
    }
    return page;
  }

  measureText(
    text: string,
    fontSize: number,
    font: DocumentFont = 'helvetica',
  ): number {
    const measured = font === 'helvetica' ? toWinAnsi(text) : text;
    return this.fonts[font].widthOfTextAtSize(measured, fontSize);
  }

  async save(outputPath: string): Promise<void> {
    if (this.closed) {
      throw new Error('Cannot save a closed document');
    }
    const bytes = await this.pdf.save();
    await fs.writeFile(outputPath, bytes);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
