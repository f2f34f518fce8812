/**
 * Chunk Segmenter Service
 * Rule-based split of answer text into sub-question chunks
 */

import { Injectable, Logger } from '@nestjs/common';

export interface AnswerChunk {
  /** 1-based position of the chunk */
  chunkId: number;
  questionNumber: string;
  answer: string;
}

interface LabelMatch {
  label: string;
  start: number;
  bodyStart: number;
}

const LETTER_LABEL_PATTERN = /^[ \t]*(\(([a-zA-Z])\)|([a-zA-Z])\))[ \t]+/gm;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

@Injectable()
export class ChunkSegmenterService {
  private readonly logger = new Logger(ChunkSegmenterService.name);

  /**
   * Split answer text for one question into chunks
   * @param text Normalized answer text
   * @param questionNumber Main question number, e.g. "1"
   */
  segment(text: string, questionNumber: string): AnswerChunk[] {
    const main = questionNumber.trim();
    const labels = this.findNumericLabels(text, main);
    const matches = labels.length > 0 ? labels : this.findLetterLabels(text);

    if (matches.length === 0) {
      this.logger.debug(
        `No sub-question labels for question ${main}, using a single chunk`,
      );
      return this.number([{ questionNumber: main, answer: text.trim() }]);
    }

    const parts: Array<Omit<AnswerChunk, 'chunkId'>> = [];
    const preamble = text.slice(0, matches[0].start).trim();
    if (preamble) {
      parts.push({ questionNumber: main, answer: preamble });
    }

    matches.forEach((match, i) => {
      const end = i + 1 < matches.length ? matches[i + 1].start : text.length;
      parts.push({
        questionNumber: match.label,
        answer: text.slice(match.bodyStart, end).trim(),
      });
    });

    const chunks = this.number(parts);
    this.logger.debug(
      `Segmented question ${main} into ${chunks.length} chunks: ${chunks
        .map((c) => c.questionNumber)
        .join(', ')}`,
    );
    return chunks;
  }

  private findNumericLabels(text: string, main: string): LabelMatch[] {
    const pattern = new RegExp(
      `^[ \\t]*(${escapeRegExp(main)}\\.\\d+(?:\\([a-z]\\))?)(?!\\d)[.:)]?[ \\t]*`,
      'gm',
    );
    return [...text.matchAll(pattern)].map((m) => ({
      label: m[1],
      start: m.index ?? 0,
      bodyStart: (m.index ?? 0) + m[0].length,
    }));
  }

  private findLetterLabels(text: string): LabelMatch[] {
    return [...text.matchAll(LETTER_LABEL_PATTERN)].map((m) => ({
      label: `${m[2] ?? m[3]})`,
      start: m.index ?? 0,
      bodyStart: (m.index ?? 0) + m[0].length,
    }));
  }

  private number(parts: Array<Omit<AnswerChunk, 'chunkId'>>): AnswerChunk[] {
    return parts
      .filter((part) => part.answer.length > 0)
      .map((part, i) => ({ chunkId: i + 1, ...part }));
  }
}
