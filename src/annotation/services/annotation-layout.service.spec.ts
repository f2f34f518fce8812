/**
 * Annotation Layout Service Test
 */

import { Logger } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import configuration from '../../config/configuration';
import {
  fixedWidthPage,
  InMemoryPdfDocument,
  type InMemoryDocumentOptions,
} from '../../pdf/testing/in-memory-pdf-document';

import { AnnotationLayoutService } from './annotation-layout.service';

const RED = { r: 1, g: 0, b: 0 };
const NINE_WORDS = 'aaaaa bbbbb ccccc ddddd eeeee fffff ggggg hhhhh iiiii';

describe('AnnotationLayoutService', () => {
  let service: AnnotationLayoutService;
  let module: TestingModule;
  let warn: jest.SpyInstance;

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [ConfigModule.forRoot({ isGlobal: true, load: [configuration] })],
      providers: [AnnotationLayoutService],
    }).compile();

    service = module.get<AnnotationLayoutService>(AnnotationLayoutService);
  });

  beforeEach(() => {
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  afterAll(async () => {
    await module.close();
  });

  const blankDocument = (options: InMemoryDocumentOptions = {}) =>
    new InMemoryPdfDocument([fixedWidthPage([], { width: 600 })], options);

  describe('wrapText', () => {
    it('should fill each line greedily up to the width', () => {
      // 8pt at half-em glyphs: 4pt per character, 90pt holds 22 characters
      expect(service.wrapText(blankDocument(), NINE_WORDS, 90, 8)).toEqual([
        'aaaaa bbbbb ccccc',
        'ddddd eeeee fffff',
        'ggggg hhhhh iiiii',
      ]);
    });

    it('should give an over-wide word its own line', () => {
      expect(
        service.wrapText(blankDocument(), 'a supercalifragilistic b', 20, 8),
      ).toEqual(['a', 'supercalifragilistic', 'b']);
    });

    it('should return no lines for blank text', () => {
      expect(service.wrapText(blankDocument(), '  \n ', 90, 8)).toEqual([]);
    });
  });

  describe('placeComment', () => {
    it('should clip the comment to the lines that fit above the next question', () => {
      const document = blankDocument();

      const placement = service.placeComment(
        document,
        document.page(0),
        { top: 100, bottom: 128 },
        NINE_WORDS,
      );

      expect(placement).toEqual({
        linesDrawn: 2,
        totalLines: 3,
        truncated: true,
        failures: [],
      });
      expect(document.textOperations()).toEqual([
        {
          type: 'text',
          pageIndex: 0,
          point: { x: 510, y: 100 },
          text: 'aaaaa bbbbb ccccc',
          style: { font: 'helvetica', fontSize: 8, color: RED },
        },
        {
          type: 'text',
          pageIndex: 0,
          point: { x: 510, y: 110 },
          text: 'ddddd eeeee fffff',
          style: { font: 'helvetica', fontSize: 8, color: RED },
        },
      ]);
      expect(warn).toHaveBeenCalledWith(
        'Reached y_limit=123.00 on page 1, truncating comment after 2/3 lines',
      );
    });

    it('should draw the whole comment when the band allows', () => {
      const document = blankDocument();

      const placement = service.placeComment(
        document,
        document.page(0),
        { top: 100, bottom: 800 },
        NINE_WORDS,
      );

      expect(placement.linesDrawn).toBe(3);
      expect(placement.truncated).toBe(false);
      expect(warn).not.toHaveBeenCalled();
    });

    it('should keep drawing after a failed line', () => {
      const document = blankDocument({
        failDraw: (op) =>
          op.type === 'text' && op.text === 'ddddd eeeee fffff'
            ? 'glyph missing'
            : undefined,
      });

      const placement = service.placeComment(
        document,
        document.page(0),
        { top: 100, bottom: 800 },
        NINE_WORDS,
      );

      expect(placement).toEqual({
        linesDrawn: 2,
        totalLines: 3,
        truncated: false,
        failures: ['glyph missing'],
      });
      expect(document.textOperations().map((op) => op.text)).toEqual([
        'aaaaa bbbbb ccccc',
        'ggggg hhhhh iiiii',
      ]);
    });
  });

  describe('placeScore', () => {
    it('should write the score left of and below the label top', () => {
      const document = blankDocument();

      const result = service.placeScore(
        document.page(0),
        { x0: 72, y0: 100, x1: 87, y1: 110 },
        '3/5',
      );

      expect(result).toEqual({ ok: true });
      expect(document.textOperations()).toEqual([
        {
          type: 'text',
          pageIndex: 0,
          point: { x: 32, y: 110 },
          text: '3/5',
          style: { font: 'helvetica', fontSize: 12, color: { r: 0, g: 0, b: 1 } },
        },
      ]);
    });

    it('should report a drawing failure', () => {
      const document = blankDocument({ failDraw: () => 'ink error' });

      expect(
        service.placeScore(document.page(0), { x0: 72, y0: 100, x1: 87, y1: 110 }, '3/5'),
      ).toEqual({ ok: false, reason: 'ink error' });
    });
  });

  describe('placeTick', () => {
    it('should place the tick left of the line, never past the margin', () => {
      const document = blankDocument();
      const page = document.page(0);

      service.placeTick(page, { x0: 100, y0: 100, x1: 200, y1: 110 });
      service.placeTick(page, { x0: 20, y0: 300, x1: 120, y1: 310 });

      expect(document.textOperations()).toEqual([
        {
          type: 'text',
          pageIndex: 0,
          point: { x: 75, y: 110 },
          text: '✔',
          style: { font: 'symbol', fontSize: 12, color: { r: 0, g: 0, b: 0 } },
        },
        {
          type: 'text',
          pageIndex: 0,
          point: { x: 10, y: 310 },
          text: '✔',
          style: { font: 'symbol', fontSize: 12, color: { r: 0, g: 0, b: 0 } },
        },
      ]);
    });
  });

  describe('underlineOccurrences', () => {
    it('should underline every occurrence', () => {
      const document = new InMemoryPdfDocument([
        fixedWidthPage([{ text: 'control passes and control remains', y: 100 }]),
      ]);

      const placement = service.underlineOccurrences(document.page(0), ' control ');

      expect(placement).toEqual({ occurrences: 2, drawn: 2, failures: [] });
      expect(document.lineOperations()).toEqual([
        {
          type: 'line',
          pageIndex: 0,
          from: { x: 72, y: 112 },
          to: { x: 107, y: 112 },
          style: { thickness: 1.5, color: RED },
        },
        {
          type: 'line',
          pageIndex: 0,
          from: { x: 167, y: 112 },
          to: { x: 202, y: 112 },
          style: { thickness: 1.5, color: RED },
        },
      ]);
    });

    it('should do nothing for a phrase that is not on the page', () => {
      const document = new InMemoryPdfDocument([
        fixedWidthPage([{ text: 'control passes', y: 100 }]),
      ]);

      expect(service.underlineOccurrences(document.page(0), 'goodwill')).toEqual({
        occurrences: 0,
        drawn: 0,
        failures: [],
      });
      expect(document.operations).toEqual([]);
    });
  });
});
