/**
 * PDF Module
 * Page text, layout and drawing primitives
 */

import { Module } from '@nestjs/common';

import { PdfDocumentService } from './services/pdf-document.service';
import { PdfLayoutService } from './services/pdf-layout.service';

@Module({
  providers: [PdfDocumentService, PdfLayoutService],
  exports: [PdfDocumentService],
})
export class PdfModule {}
