/**
 * PDF Document Service
 * Opens a PDF as an annotatable document
 */

import { promises as fs } from 'fs';

import { Injectable, Logger } from '@nestjs/common';
import { PDFDocument } from 'pdf-lib';

import type { AnnotatableDocument } from '../interfaces/annotatable-document.interface';

import { PdfLayoutService } from './pdf-layout.service';
import { PdfLibDocument } from './pdf-lib-document';

@Injectable()
export class PdfDocumentService {
  private readonly logger = new Logger(PdfDocumentService.name);

  constructor(private readonly pdfLayoutService: PdfLayoutService) {}

  /**
   * Open a PDF for annotation
   * @param pdfPath Local file path
   */
  async open(pdfPath: string): Promise<AnnotatableDocument> {
    const bytes = await fs.readFile(pdfPath);
    const layouts = await this.pdfLayoutService.extractLayouts(bytes);
    const pdf = await PDFDocument.load(bytes);
    const document = await PdfLibDocument.create(pdf, layouts);

    this.logger.log(`Opened ${pdfPath} with ${document.pageCount} pages`);
    return document;
  }

  /**
   * Plain text of every page of a PDF
   */
  async readPageTexts(pdfPath: string): Promise<string[]> {
    const bytes = await fs.readFile(pdfPath);
    return this.pdfLayoutService.extractPageTexts(bytes);
  }
}
