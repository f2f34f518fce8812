/**
 * Application configuration
 * Layout constants can be overridden per deployment through the environment
 */

import type { LogLevel } from '@nestjs/common';

import {
  DEFAULT_BOILERPLATE_PATTERNS,
  DEFAULT_LAYOUT,
  DEFAULT_MATCHING,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_SPAN_STOP_WORDS,
} from '../common/constants';
import type {
  AnnotationLayoutConfig,
  EvidenceMatchingConfig,
} from '../common/types/layout';

const LOG_LEVELS: LogLevel[] = [
  'log',
  'error',
  'warn',
  'debug',
  'verbose',
  'fatal',
];

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function listFromEnv(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function logLevelsFromEnv(): LogLevel[] {
  const levels = listFromEnv('LOG_LEVEL', ['log', 'warn', 'error']).filter(
    isLogLevel,
  );
  return levels.length > 0 ? levels : ['log', 'warn', 'error'];
}

function layoutFromEnv(): AnnotationLayoutConfig {
  const { score, comment, tick, underline } = DEFAULT_LAYOUT;
  return {
    score: {
      ...score,
      offsetX: numberFromEnv('ANNOTATION_SCORE_OFFSET_X', score.offsetX),
      offsetY: numberFromEnv('ANNOTATION_SCORE_OFFSET_Y', score.offsetY),
      fontSize: numberFromEnv('ANNOTATION_SCORE_FONT_SIZE', score.fontSize),
    },
    comment: {
      ...comment,
      width: numberFromEnv('ANNOTATION_COMMENT_WIDTH', comment.width),
      fontSize: numberFromEnv('ANNOTATION_COMMENT_FONT_SIZE', comment.fontSize),
      lineSpacing: numberFromEnv(
        'ANNOTATION_COMMENT_LINE_SPACING',
        comment.lineSpacing,
      ),
      bottomMargin: numberFromEnv(
        'ANNOTATION_COMMENT_BOTTOM_MARGIN',
        comment.bottomMargin,
      ),
    },
    tick: {
      ...tick,
      offsetX: numberFromEnv('ANNOTATION_TICK_OFFSET_X', tick.offsetX),
      offsetY: numberFromEnv('ANNOTATION_TICK_OFFSET_Y', tick.offsetY),
      minX: numberFromEnv('ANNOTATION_TICK_MIN_X', tick.minX),
      fontSize: numberFromEnv('ANNOTATION_TICK_FONT_SIZE', tick.fontSize),
    },
    underline: {
      ...underline,
      offsetY: numberFromEnv('ANNOTATION_UNDERLINE_OFFSET_Y', underline.offsetY),
      thickness: numberFromEnv(
        'ANNOTATION_UNDERLINE_THICKNESS',
        underline.thickness,
      ),
    },
  };
}

function matchingFromEnv(): EvidenceMatchingConfig {
  return {
    prefixLength: numberFromEnv(
      'ANNOTATION_MATCH_PREFIX_LENGTH',
      DEFAULT_MATCHING.prefixLength,
    ),
    fallbackMinWords: numberFromEnv(
      'ANNOTATION_FALLBACK_MIN_WORDS',
      DEFAULT_MATCHING.fallbackMinWords,
    ),
    positionPrecision: numberFromEnv(
      'ANNOTATION_POSITION_PRECISION',
      DEFAULT_MATCHING.positionPrecision,
    ),
  };
}

export default () => ({
  server: {
    port: parseInt(process.env.PORT || '14000', 10),
    env: process.env.NODE_ENV || 'development',
    logLevels: logLevelsFromEnv(),
  },
  annotation: {
    outputDir: process.env.ANNOTATION_OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
    layout: layoutFromEnv(),
    matching: matchingFromEnv(),
    spans: {
      stopWords: listFromEnv('ANNOTATION_SPAN_STOP_WORDS', DEFAULT_SPAN_STOP_WORDS),
    },
  },
  extraction: {
    boilerplatePatterns: DEFAULT_BOILERPLATE_PATTERNS,
  },
});
