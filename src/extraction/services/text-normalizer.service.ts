/**
 * Text Normalizer Service
 * Cleans extracted page text before segmentation and matching
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DEFAULT_BOILERPLATE_PATTERNS } from '../../common/constants';

/**
 * Running page headers such as "3 /12" at the start of a line
 */
const PAGE_HEADER_PATTERN = /^\d+ \/\d+\s*/gm;

@Injectable()
export class TextNormalizerService {
  private readonly logger = new Logger(TextNormalizerService.name);
  private readonly boilerplate: RegExp[];

  constructor(private readonly configService: ConfigService) {
    const sources =
      this.configService.get<string[]>('extraction.boilerplatePatterns') ??
      DEFAULT_BOILERPLATE_PATTERNS;
    this.boilerplate = sources.map((source) => new RegExp(source, 'g'));
  }

  /**
   * Normalize raw page text
   * @param text Raw extracted text
   * @returns Text without running headers, boilerplate or runs of blank lines
   */
  normalize(text: string): string {
    let cleaned = text.replace(/\r\n?/g, '\n').replace(PAGE_HEADER_PATTERN, '');

    for (const pattern of this.boilerplate) {
      cleaned = cleaned.replace(pattern, '');
    }

    cleaned = cleaned
      .split('\n')
      .map((line) => line.trimEnd())
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();

    if (cleaned.length !== text.trim().length) {
      this.logger.debug(
        `Normalized text from ${text.length} to ${cleaned.length} characters`,
      );
    }
    return cleaned;
  }
}
