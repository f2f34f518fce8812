/**
 * Layout configuration types
 */

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

export interface ScoreLayout {
  /** Horizontal offset from the label's left edge */
  offsetX: number;
  /** Baseline offset below the label's top edge */
  offsetY: number;
  fontSize: number;
  color: RgbColor;
}

export interface CommentLayout {
  /** Width of the comment column, flush with the page's right edge */
  width: number;
  fontSize: number;
  /** Added to the font size to give the line height */
  lineSpacing: number;
  /** Gap kept above the next question's anchor */
  bottomMargin: number;
  color: RgbColor;
}

export interface TickLayout {
  offsetX: number;
  offsetY: number;
  /** Ticks never start left of this x */
  minX: number;
  fontSize: number;
  glyph: string;
  color: RgbColor;
}

export interface UnderlineLayout {
  offsetY: number;
  thickness: number;
  color: RgbColor;
}

export interface AnnotationLayoutConfig {
  score: ScoreLayout;
  comment: CommentLayout;
  tick: TickLayout;
  underline: UnderlineLayout;
}

export interface EvidenceMatchingConfig {
  /** Characters of each evidence line used for searching */
  prefixLength: number;
  /** Distinct words needed for a word-by-word fallback match */
  fallbackMinWords: number;
  /** Decimal places kept when keying tick positions */
  positionPrecision: number;
}
