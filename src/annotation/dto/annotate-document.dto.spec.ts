/**
 * Annotate Document DTO Test
 */

import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';

import { AnnotateDocumentDto } from './annotate-document.dto';

describe('AnnotateDocumentDto', () => {
  const validateBody = (grades: unknown[]) =>
    validate(
      plainToInstance(AnnotateDocumentDto, {
        inputPdfPath: '/data/scripts/student.pdf',
        studentName: 'Student-One',
        grades,
      }),
      { whitelist: true, forbidNonWhitelisted: true },
    );

  it('should accept rubric cells of any shape', async () => {
    const errors = await validateBody([
      { question_number: '1.1', score: 2, total_marks: 3, correct_words: ['control', 3] },
      { question_number: 1.2, score: '1', total_marks: '2', correct_lines: 7 },
    ]);

    expect(errors).toEqual([]);
  });

  it('should reject a row without a score', async () => {
    const errors = await validateBody([{ question_number: '1.1', total_marks: 3 }]);

    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('grades');
    expect(errors[0].children?.[0].children?.[0].constraints).toEqual({
      isStringOrNumber: 'score must be a string or a number',
    });
  });
});
