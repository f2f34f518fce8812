/**
 * Grade Ingestion Service Test
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

import { Logger } from '@nestjs/common';

import type { GradeRow } from '../../common/types/grade';

import {
  GradeIngestionService,
  parseRubricCell,
} from './grade-ingestion.service';

describe('parseRubricCell', () => {
  it('should resolve a list literal', () => {
    expect(parseRubricCell(`["line one", "line two"]`)).toEqual({
      kind: 'list',
      items: ['line one', 'line two'],
    });
  });

  it('should keep bare text as a trimmed scalar', () => {
    expect(parseRubricCell('  lone line  ')).toEqual({
      kind: 'scalar',
      text: 'lone line',
    });
  });

  it('should unwrap a quoted string', () => {
    expect(parseRubricCell(`' quoted '`)).toEqual({ kind: 'scalar', text: 'quoted' });
  });

  it('should keep malformed list text as a scalar', () => {
    expect(parseRubricCell(`['unterminated`)).toEqual({
      kind: 'scalar',
      text: `['unterminated`,
    });
  });

  it('should keep numbers as their text', () => {
    expect(parseRubricCell('42')).toEqual({ kind: 'scalar', text: '42' });
  });

  it('should accept decoded lists', () => {
    expect(parseRubricCell(['a', ['b', null]])).toEqual({
      kind: 'list',
      items: ['a', ['b', null]],
    });
  });

  it('should keep numbers and booleans in a cell as their text', () => {
    expect(parseRubricCell(7)).toEqual({ kind: 'scalar', text: '7' });
    expect(parseRubricCell(true)).toEqual({ kind: 'scalar', text: 'true' });
  });

  it('should null out list members that are not text or numbers', () => {
    expect(parseRubricCell(['control', 3, { note: 'x' }])).toEqual({
      kind: 'list',
      items: ['control', 3, null],
    });
  });

  it.each([[null], [undefined], [''], ['   '], ['None'], [{ line: 'x' }]])(
    'should treat %p as missing',
    (raw) => {
      expect(parseRubricCell(raw)).toBeUndefined();
    },
  );
});

describe('GradeIngestionService', () => {
  const service = new GradeIngestionService();

  describe('flattenLines', () => {
    it('should flatten a list literal into ordered lines', () => {
      expect(service.flattenLines([parseRubricCell(`["line one", "line two"]`)])).toEqual([
        'line one',
        'line two',
      ]);
    });

    it('should flatten bare text into one line', () => {
      expect(service.flattenLines([parseRubricCell('lone line')])).toEqual(['lone line']);
    });

    it('should flatten depth first and skip blanks and non-text entries', () => {
      const cells = [
        parseRubricCell(`['a', 3, ['  b  ', '']]`),
        undefined,
        parseRubricCell('c'),
      ];

      expect(service.flattenLines(cells)).toEqual(['a', 'b', 'c']);
    });
  });

  describe('ingest', () => {
    const rows: GradeRow[] = [
      {
        question_number: '1.1',
        score: 3,
        total_marks: 5,
        comment: 'Good',
        correct_lines: `['L1', 'L2']`,
        correct_words: `['control']`,
      },
      {
        question_number: 1.2,
        score: '2',
        total_marks: '4',
        comment: '',
        correct_lines: 'bare line',
        correct_words: null,
      },
      { question_number: '1.1', score: 4, total_marks: 5, comment: 'Better' },
    ];

    it('should build score and comment tables where the last row wins', () => {
      const tables = service.ingest(rows);

      expect([...tables.scores]).toEqual([
        ['1.1', '4/5'],
        ['1.2', '2/4'],
      ]);
      expect([...tables.comments]).toEqual([['1.1', 'Better']]);
    });

    it('should collect correct lines and phrase groups in row order', () => {
      const tables = service.ingest(rows);

      expect(tables.correctLines).toEqual(['L1', 'L2', 'bare line']);
      expect(tables.phraseGroups).toEqual([['control']]);
    });

    it('should add unanswered model-answer questions', () => {
      const tables = service.ingest(
        [rows[0]],
        [
          {
            question_number: '1',
            sub_answers: [
              { question_number: '1.1', maximum_marks: '5 marks' },
              {
                question_number: '1.3',
                maximum_marks: null,
                total_marks_available: 'Total: 6',
              },
            ],
          },
          { question_number: '2', maximum_marks: 'ten' },
        ],
      );

      expect(tables.scores.get('1.3')).toBe('0/6');
      expect(tables.scores.get('2')).toBe('0/0');
      expect(tables.comments.get('1.3')).toBe('No answer provided');
      expect(tables.scores.get('1.1')).toBe('3/5');
      expect(tables.records).toHaveLength(3);
    });
  });

  describe('loadRows', () => {
    let workDir: string;

    beforeAll(async () => {
      workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'grades-'));
    });

    afterAll(async () => {
      await fs.rm(workDir, { recursive: true, force: true });
    });

    it('should read rows under a grades key and skip malformed rows', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      const file = path.join(workDir, 'wrapped.json');
      await fs.writeFile(
        file,
        JSON.stringify({
          grades: [
            { question_number: '1.1', score: 2, total_marks: 3, correct_lines: ['x'] },
            { score: 1 },
          ],
        }),
      );

      const loaded = await service.loadRows(file);

      expect(loaded).toEqual([
        {
          question_number: '1.1',
          score: 2,
          total_marks: 3,
          comment: undefined,
          correct_lines: ['x'],
          correct_words: undefined,
        },
      ]);
      expect(warn).toHaveBeenCalledWith(`Skipping malformed grade row 1 in ${file}`);
      warn.mockRestore();
    });

    it('should keep rows whose rubric cells hold numbers', async () => {
      const file = path.join(workDir, 'numeric-cells.json');
      await fs.writeFile(
        file,
        JSON.stringify([
          {
            question_number: '1.1',
            score: 2,
            total_marks: 3,
            comment: 'Partly right',
            correct_words: ['control', 3],
          },
          { question_number: '1.2', score: 1, total_marks: 2, correct_lines: 7 },
        ]),
      );

      const loaded = await service.loadRows(file);
      const tables = service.ingest(loaded);

      expect(loaded.map((row) => row.question_number)).toEqual(['1.1', '1.2']);
      expect([...tables.scores]).toEqual([
        ['1.1', '2/3'],
        ['1.2', '1/2'],
      ]);
      expect(tables.comments.get('1.1')).toBe('Partly right');
      expect(tables.phraseGroups).toEqual([['control']]);
      expect(tables.correctLines).toEqual(['7']);
    });

    it('should read a top-level array', async () => {
      const file = path.join(workDir, 'array.json');
      await fs.writeFile(
        file,
        JSON.stringify([{ question_number: 2.1, score: '1', total_marks: '2' }]),
      );

      const loaded = await service.loadRows(file);

      expect(loaded.map((row) => row.question_number)).toEqual([2.1]);
    });

    it('should reject a file without a list of grades', async () => {
      const file = path.join(workDir, 'object.json');
      await fs.writeFile(file, JSON.stringify({ rows: [] }));

      await expect(service.loadRows(file)).rejects.toThrow(
        `${file} does not contain a list of grades`,
      );
    });
  });
});
