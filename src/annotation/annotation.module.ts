/**
 * Annotation Module
 * Locates questions and credited text in a script and draws the marking
 */

import { Module } from '@nestjs/common';

import { PdfModule } from '../pdf/pdf.module';

import { AnnotationController } from './annotation.controller';
import { AnnotationService } from './annotation.service';
import { AnnotationLayoutService } from './services/annotation-layout.service';
import { EvidenceLocatorService } from './services/evidence-locator.service';
import { GradeIngestionService } from './services/grade-ingestion.service';
import { QuestionSpanLocatorService } from './services/question-span-locator.service';

@Module({
  imports: [PdfModule],
  controllers: [AnnotationController],
  providers: [
    AnnotationService,
    GradeIngestionService,
    QuestionSpanLocatorService,
    EvidenceLocatorService,
    AnnotationLayoutService,
  ],
  exports: [AnnotationService],
})
export class AnnotationModule {}
