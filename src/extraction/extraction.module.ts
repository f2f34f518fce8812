/**
 * Extraction Module
 * Text normalization and answer segmentation
 */

import { Module } from '@nestjs/common';

import { PdfModule } from '../pdf/pdf.module';

import { ExtractionController } from './extraction.controller';
import { ExtractionService } from './extraction.service';
import { ChunkSegmenterService } from './services/chunk-segmenter.service';
import { TextNormalizerService } from './services/text-normalizer.service';

@Module({
  imports: [PdfModule],
  controllers: [ExtractionController],
  providers: [ExtractionService, TextNormalizerService, ChunkSegmenterService],
  exports: [ExtractionService, TextNormalizerService],
})
export class ExtractionModule {}
