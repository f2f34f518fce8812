/**
 * Annotation Controller
 * REST endpoint for annotating a graded script
 */

import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Res,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';

import { AnnotationService } from './annotation.service';
import { AnnotateDocumentDto } from './dto/annotate-document.dto';
import { AnnotationResponse } from './responses/annotation.response';

@ApiTags('annotation')
@Controller('annotation')
export class AnnotationController {
  private readonly logger = new Logger(AnnotationController.name);

  constructor(private readonly annotationService: AnnotationService) {}

  @Post('annotate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Annotate a graded script',
    description:
      'Writes scores, comments, ticks and underlines onto the student PDF and saves an annotated copy',
  })
  @ApiBody({ type: AnnotateDocumentDto })
  @ApiResponse({ status: 200, description: 'Annotated', type: AnnotationResponse })
  @ApiResponse({
    status: 422,
    description: 'Run aborted: missing input, empty grades, unreadable PDF or failed save',
    type: AnnotationResponse,
  })
  async annotate(
    @Body() dto: AnnotateDocumentDto,
    @Res({ passthrough: true }) res: Pick<Response, 'status'>,
  ): Promise<AnnotationResponse> {
    this.logger.log(
      `Annotate request: ${dto.inputPdfPath} for ${dto.studentName}`,
    );

    const result = await this.annotationService.annotate(dto);
    if (!result.success) {
      res.status(HttpStatus.UNPROCESSABLE_ENTITY);
    }
    return {
      success: result.success,
      message: result.success
        ? 'Annotated PDF saved'
        : (result.reason ?? 'Annotation failed'),
      outputPath: result.outputPath,
      report: result.report,
    };
  }
}
