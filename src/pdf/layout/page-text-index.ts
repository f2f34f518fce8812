/**
 * Page text index
 * Rebuilds reading-order text from positioned text runs and maps search hits
 * back to page coordinates
 */

import { type Rect, unionRect } from '../../common/types/geometry';

/**
 * A run of text as laid out on the page (top-left origin)
 */
export interface PositionedText {
  str: string;
  x: number;
  /** Top edge of the run */
  y: number;
  width: number;
  height: number;
}

export interface PageLayout {
  width: number;
  height: number;
  items: PositionedText[];
}

interface Glyph {
  char: string;
  /** null for separators inserted between runs or lines */
  box: Rect | null;
  line: number;
}

const LINE_Y_TOLERANCE = 2;
const X_GAP_SPACE_THRESHOLD = 1;
const WHITESPACE = /\s/;

export class PageTextIndex {
  readonly text: string;
  private readonly stream: Glyph[];
  private readonly streamText: string;

  constructor(items: PositionedText[]) {
    const lines = PageTextIndex.groupLines(items);
    const lineGlyphs = lines.map((line, lineNo) =>
      PageTextIndex.lineToGlyphs(line, lineNo),
    );

    this.text = lineGlyphs
      .map((glyphs) => glyphs.map((g) => g.char).join(''))
      .join('\n');

    this.stream = PageTextIndex.collapse(lineGlyphs);
    this.streamText = this.stream.map((g) => g.char).join('');
  }

  /**
   * Every non-overlapping occurrence of `needle`, one rect per line it spans.
   * Whitespace runs compare as a single space; line breaks count as spaces.
   */
  search(needle: string): Rect[] {
    const target = needle.replace(/\s+/g, ' ').trim();
    if (!target) {
      return [];
    }

    const rects: Rect[] = [];
    let from = 0;
    while (from <= this.streamText.length - target.length) {
      const at = this.streamText.indexOf(target, from);
      if (at === -1) {
        break;
      }
      rects.push(...this.rectsFor(at, at + target.length));
      from = at + target.length;
    }
    return rects;
  }

  private rectsFor(start: number, end: number): Rect[] {
    const perLine = new Map<number, Rect>();
    for (let i = start; i < end; i++) {
      const glyph = this.stream[i];
      if (!glyph.box) {
        continue;
      }
      const current = perLine.get(glyph.line);
      perLine.set(glyph.line, current ? unionRect(current, glyph.box) : glyph.box);
    }
    return [...perLine.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, rect]) => rect);
  }

  /**
   * Group runs into visual lines: top-to-bottom, then left-to-right
   */
  private static groupLines(items: PositionedText[]): PositionedText[][] {
    const sorted = items
      .filter((item) => item.str.length > 0)
      .sort((a, b) => a.y - b.y || a.x - b.x);

    const lines: PositionedText[][] = [];
    let lineY = Number.NEGATIVE_INFINITY;
    for (const item of sorted) {
      const current = lines[lines.length - 1];
      if (current && Math.abs(item.y - lineY) <= LINE_Y_TOLERANCE) {
        current.push(item);
      } else {
        lines.push([item]);
        lineY = item.y;
      }
    }
    return lines.map((line) => line.sort((a, b) => a.x - b.x));
  }

  private static lineToGlyphs(line: PositionedText[], lineNo: number): Glyph[] {
    const glyphs: Glyph[] = [];
    let previous: PositionedText | undefined;

    for (const item of line) {
      if (previous) {
        const gap = item.x - (previous.x + previous.width);
        const touchesSpace =
          WHITESPACE.test(previous.str.charAt(previous.str.length - 1)) ||
          WHITESPACE.test(item.str.charAt(0));
        if (gap > X_GAP_SPACE_THRESHOLD && !touchesSpace) {
          glyphs.push({ char: ' ', box: null, line: lineNo });
        }
      }

      const chars = item.str.split('');
      const charWidth = item.width / chars.length;
      chars.forEach((char, i) => {
        glyphs.push({
          char,
          box: {
            x0: item.x + i * charWidth,
            y0: item.y,
            x1: item.x + (i + 1) * charWidth,
            y1: item.y + item.height,
          },
          line: lineNo,
        });
      });
      previous = item;
    }
    return glyphs;
  }

  /**
   * Flatten lines into one searchable stream with single spaces
   */
  private static collapse(lines: Glyph[][]): Glyph[] {
    const stream: Glyph[] = [];
    const pushSpace = (line: number) => {
      const last = stream[stream.length - 1];
      if (last && last.char !== ' ') {
        stream.push({ char: ' ', box: null, line });
      }
    };

    lines.forEach((glyphs, lineNo) => {
      pushSpace(lineNo);
      for (const glyph of glyphs) {
        if (WHITESPACE.test(glyph.char)) {
          pushSpace(lineNo);
        } else {
          stream.push(glyph);
        }
      }
    });

    while (stream.length > 0 && stream[stream.length - 1].char === ' ') {
      stream.pop();
    }
    return stream;
  }
}
