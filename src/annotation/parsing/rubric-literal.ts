/**
 * Rubric literal reader
 * Decodes list literals such as ['first line', "second line",] as written
 * by the grading step
 */

import type { RubricValue } from '../../common/types/grade';

export class RubricLiteralError extends Error {
  constructor(message: string, readonly position: number) {
    super(`${message} at position ${position}`);
    this.name = 'RubricLiteralError';
  }
}

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '0': '\0',
};

const KEYWORDS = new Map<string, RubricValue>([
  ['True', true],
  ['False', false],
  ['None', null],
]);

class LiteralReader {
  private pos = 0;

  constructor(private readonly source: string) {}

  read(): RubricValue {
    const value = this.value();
    this.skipWhitespace();
    if (this.pos < this.source.length) {
      throw new RubricLiteralError('Unexpected trailing input', this.pos);
    }
    return value;
  }

  private value(): RubricValue {
    this.skipWhitespace();
    const ch = this.source[this.pos];
    if (ch === '[') {
      return this.list();
    }
    if (ch === "'" || ch === '"') {
      return this.string(ch);
    }
    if (ch !== undefined && /[-+\d.]/.test(ch)) {
      return this.number();
    }
    return this.keyword();
  }

  private list(): RubricValue[] {
    const items: RubricValue[] = [];
    this.pos++;
    for (;;) {
      this.skipWhitespace();
      if (this.source[this.pos] === ']') {
        this.pos++;
        return items;
      }
      items.push(this.value());
      this.skipWhitespace();
      const next = this.source[this.pos];
      if (next === ',') {
        this.pos++;
      } else if (next !== ']') {
        throw new RubricLiteralError("Expected ',' or ']'", this.pos);
      }
    }
  }

  private string(quote: string): string {
    let out = '';
    this.pos++;
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos++];
      if (ch === quote) {
        return out;
      }
      if (ch === '\n') {
        break;
      }
      if (ch === '\\') {
        const escaped = this.source[this.pos++];
        if (escaped === undefined) {
          break;
        }
        out += ESCAPES[escaped] ?? `\\${escaped}`;
        continue;
      }
      out += ch;
    }
    throw new RubricLiteralError('Unterminated string', this.pos);
  }

  private number(): number {
    const match = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/.exec(
      this.source.slice(this.pos),
    );
    if (!match) {
      throw new RubricLiteralError('Invalid number', this.pos);
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private keyword(): RubricValue {
    const match = /^[A-Za-z_]\w*/.exec(this.source.slice(this.pos));
    const keyword = match?.[0];
    if (keyword !== undefined && KEYWORDS.has(keyword)) {
      this.pos += keyword.length;
      return KEYWORDS.get(keyword) ?? null;
    }
    throw new RubricLiteralError('Unexpected token', this.pos);
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos])) {
      this.pos++;
    }
  }
}

/**
 * Decode one literal
 * @throws RubricLiteralError when the text is not a literal
 */
export function readRubricLiteral(source: string): RubricValue {
  return new LiteralReader(source).read();
}
