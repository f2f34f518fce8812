/**
 * Extraction Service
 * Page-range text extraction and answer segmentation for one question
 */

import { promises as fs } from 'fs';

import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';

import { PdfDocumentService } from '../pdf/services/pdf-document.service';

import {
  ChunkSegmenterService,
  type AnswerChunk,
} from './services/chunk-segmenter.service';
import { TextNormalizerService } from './services/text-normalizer.service';

interface PageText {
  pageNo: number;
  text: string;
}

@Injectable()
export class ExtractionService {
  private readonly logger = new Logger(ExtractionService.name);

  constructor(
    private readonly pdfDocumentService: PdfDocumentService,
    private readonly textNormalizerService: TextNormalizerService,
    private readonly chunkSegmenterService: ChunkSegmenterService,
  ) {}

  /**
   * Extract normalized text from specific pages
   * @param pdfPath Local PDF path
   * @param pages 1-based page numbers
   * @returns Page blocks headed "--- Page n ---", blank pages omitted
   */
  async extractPagesText(pdfPath: string, pages: number[]): Promise<string> {
    const blocks = await this.readPages(pdfPath, pages);
    return blocks
      .map((block) => `--- Page ${block.pageNo} ---\n${block.text}`)
      .join('\n\n');
  }

  /**
   * Split raw text into chunks for one question
   */
  segmentText(text: string, questionNumber: string): AnswerChunk[] {
    return this.chunkSegmenterService.segment(
      this.textNormalizerService.normalize(text),
      questionNumber,
    );
  }

  /**
   * Extract a question's answer pages and split them into chunks
   */
  async segmentPages(
    pdfPath: string,
    pages: number[],
    questionNumber: string,
  ): Promise<AnswerChunk[]> {
    const blocks = await this.readPages(pdfPath, pages);
    if (blocks.length === 0) {
      throw new BadRequestException(
        `No content found for question ${questionNumber} on pages ${pages.join(', ')}`,
      );
    }
    return this.chunkSegmenterService.segment(
      blocks.map((block) => block.text).join('\n'),
      questionNumber,
    );
  }

  /**
   * Normalized text of the listed pages, ascending, blank pages omitted
   */
  private async readPages(pdfPath: string, pages: number[]): Promise<PageText[]> {
    try {
      await fs.access(pdfPath);
    } catch {
      throw new NotFoundException(`PDF file not found: ${pdfPath}`);
    }

    const pageTexts = await this.pdfDocumentService.readPageTexts(pdfPath);
    const ordered = [...new Set(pages)].sort((a, b) => a - b);

    const blocks: PageText[] = [];
    for (const pageNo of ordered) {
      if (!Number.isInteger(pageNo) || pageNo < 1 || pageNo > pageTexts.length) {
        throw new BadRequestException(
          `Page ${pageNo} does not exist in PDF (${pageTexts.length} pages)`,
        );
      }
      const text = this.textNormalizerService.normalize(pageTexts[pageNo - 1]);
      if (text) {
        blocks.push({ pageNo, text });
      }
    }

    this.logger.log(
      `Extracted text from ${blocks.length}/${ordered.length} pages of ${pdfPath}`,
    );
    return blocks;
  }
}
