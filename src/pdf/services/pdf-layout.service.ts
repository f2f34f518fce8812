/**
 * PDF Layout Service
 * Reads positioned text runs from every page with pdfjs-dist
 */

import { Injectable, Logger } from '@nestjs/common';
import { getDocument, GlobalWorkerOptions } from 'pdfjs-dist';

import { errorMessage } from '../../common/types/result';
import {
  PageTextIndex,
  type PageLayout,
  type PositionedText,
} from '../layout/page-text-index';

/**
 * Share of the font height above the baseline
 */
const ASCENT_RATIO = 0.9;
/**
 * Share of the font height below the baseline
 */
const DESCENT_RATIO = 0.25;

@Injectable()
export class PdfLayoutService {
  private readonly logger = new Logger(PdfLayoutService.name);

  constructor() {
    // pdfjs runs a fake worker in Node; point it at the bundled worker script
    if (!GlobalWorkerOptions.workerSrc) {
      GlobalWorkerOptions.workerSrc = require.resolve(
        'pdfjs-dist/build/pdf.worker.js',
      );
    }
  }

  /**
   * Extract the layout of every page
   * @param bytes Raw PDF bytes
   * @returns Page layouts in page order, coordinates with a top-left origin
   */
  async extractLayouts(bytes: Uint8Array): Promise<PageLayout[]> {
    // pdfjs transfers the buffer it is given, so hand it a copy
    const loadingTask = getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      disableFontFace: true,
      verbosity: 0,
    });

    const pdf = await loadingTask.promise;
    try {
      const layouts: PageLayout[] = [];
      for (let pageNo = 1; pageNo <= pdf.numPages; pageNo++) {
        const page = await pdf.getPage(pageNo);
        const [left, bottom, right, top] = page.view;
        const textContent = await page.getTextContent();

        const items: PositionedText[] = [];
        for (const item of textContent.items) {
          if (!('str' in item) || !item.str) {
            continue;
          }
          const [, , c, d, e, f] = item.transform;
          const fontHeight =
            Number(item.height) || Math.hypot(Number(c), Number(d));
          const baseline = top - Number(f);
          items.push({
            str: item.str,
            x: Number(e) - left,
            y: baseline - fontHeight * ASCENT_RATIO,
            width: Number(item.width),
            height: fontHeight * (ASCENT_RATIO + DESCENT_RATIO),
          });
        }

        layouts.push({ width: right - left, height: top - bottom, items });
        page.cleanup();
      }

      this.logger.debug(`Extracted layout for ${layouts.length} pages`);
      return layouts;
    } finally {
      await pdf.destroy().catch((error: unknown) => {
        this.logger.warn(`Failed to release PDF resources: ${errorMessage(error)}`);
      });
    }
  }

  /**
   * Plain text of every page
   */
  async extractPageTexts(bytes: Uint8Array): Promise<string[]> {
    const layouts = await this.extractLayouts(bytes);
    return layouts.map((layout) => new PageTextIndex(layout.items).text);
  }
}
