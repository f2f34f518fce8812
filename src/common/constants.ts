/**
 * Application constants
 * Default layout and matching values for annotation
 */

import type {
  AnnotationLayoutConfig,
  EvidenceMatchingConfig,
} from './types/layout';

/**
 * Default output directory for annotated scripts
 */
export const DEFAULT_OUTPUT_DIR = 'annotations';

/**
 * Default layout, in PDF points with a top-left origin.
 * Tuned for A4/Letter exam scripts.
 */
export const DEFAULT_LAYOUT: AnnotationLayoutConfig = {
  score: {
    offsetX: -40,
    offsetY: 10,
    fontSize: 12,
    color: { r: 0, g: 0, b: 1 },
  },
  comment: {
    width: 90,
    fontSize: 8,
    lineSpacing: 2,
    bottomMargin: 5,
    color: { r: 1, g: 0, b: 0 },
  },
  tick: {
    offsetX: -25,
    offsetY: 10,
    minX: 10,
    fontSize: 12,
    glyph: '✔',
    color: { r: 0, g: 0, b: 0 },
  },
  underline: {
    offsetY: 2,
    thickness: 1.5,
    color: { r: 1, g: 0, b: 0 },
  },
};

export const DEFAULT_MATCHING: EvidenceMatchingConfig = {
  prefixLength: 50,
  fallbackMinWords: 4,
  positionPrecision: 1,
};

/**
 * Words that mark a marks-tally line rather than a question label
 */
export const DEFAULT_SPAN_STOP_WORDS = ['marks', '/', 'score', 'total'];

/**
 * Boilerplate removed from extracted answer text
 */
export const DEFAULT_BOILERPLATE_PATTERNS = [
  'Word Processing area.*?- use the shortcut keys to copy from the spreadsheet\\s*',
];

export const NO_ANSWER_COMMENT = 'No answer provided';
