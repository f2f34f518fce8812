/**
 * Annotation Controller Test
 */

import { HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';

import { AnnotationController } from './annotation.controller';
import { AnnotationService } from './annotation.service';
import { createReport, type AnnotationResult } from './types/annotation.types';

describe('AnnotationController', () => {
  let controller: AnnotationController;
  let module: TestingModule;
  const annotate = jest.fn<Promise<AnnotationResult>, [unknown]>();
  const status = jest.fn();
  const res = { status };

  beforeAll(async () => {
    module = await Test.createTestingModule({
      controllers: [AnnotationController],
      providers: [{ provide: AnnotationService, useValue: { annotate } }],
    }).compile();

    controller = module.get<AnnotationController>(AnnotationController);
  });

  beforeEach(() => {
    annotate.mockReset();
    status.mockReset();
  });

  afterAll(async () => {
    await module.close();
  });

  const dto = {
    inputPdfPath: '/data/scripts/jane-doe.pdf',
    studentName: 'Jane-Doe',
    gradesPath: '/data/grades/jane-doe.json',
  };

  it('should return the output path of a successful run', async () => {
    annotate.mockResolvedValue({
      success: true,
      outputPath: 'annotations/jane-doe/jane-doe_annotated.pdf',
      report: createReport(),
      state: 'done',
    });

    const response = await controller.annotate(dto, res);

    expect(response).toEqual({
      success: true,
      message: 'Annotated PDF saved',
      outputPath: 'annotations/jane-doe/jane-doe_annotated.pdf',
      report: createReport(),
    });
    expect(status).not.toHaveBeenCalled();
  });

  it('should answer 422 with the reason of an aborted run', async () => {
    annotate.mockResolvedValue({
      success: false,
      reason: 'Grades are empty',
      report: createReport(),
      state: 'aborted',
    });

    const response = await controller.annotate(dto, res);

    expect(status).toHaveBeenCalledWith(HttpStatus.UNPROCESSABLE_ENTITY);
    expect(response.success).toBe(false);
    expect(response.message).toBe('Grades are empty');
  });
});
