/**
 * Extraction Controller
 * REST endpoints for page text and answer segmentation
 */

import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import {
  ExtractPageTextDto,
  SegmentPagesDto,
} from './dto/extract-page-text.dto';
import { SegmentTextDto } from './dto/segment-text.dto';
import { ExtractionService } from './extraction.service';
import {
  PageTextResponse,
  SegmentResponse,
} from './responses/extraction.response';

@ApiTags('extraction')
@Controller('extraction')
export class ExtractionController {
  private readonly logger = new Logger(ExtractionController.name);

  constructor(private readonly extractionService: ExtractionService) {}

  @Post('page-text')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Extract normalized text from PDF pages',
    description:
      'Reads the listed pages, strips running headers and boilerplate',
  })
  @ApiBody({ type: ExtractPageTextDto })
  @ApiResponse({ status: 200, type: PageTextResponse })
  @ApiResponse({ status: 400, description: 'Page outside the document' })
  @ApiResponse({ status: 404, description: 'PDF not found' })
  async extractPageText(
    @Body() dto: ExtractPageTextDto,
  ): Promise<PageTextResponse> {
    this.logger.log(
      `Extract page text request: ${dto.pdfPath} pages ${dto.pages.join(',')}`,
    );
    const text = await this.extractionService.extractPagesText(
      dto.pdfPath,
      dto.pages,
    );
    return { text };
  }

  @Post('segment')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Split answer text into sub-question chunks',
  })
  @ApiBody({ type: SegmentTextDto })
  @ApiResponse({ status: 200, type: SegmentResponse })
  segment(@Body() dto: SegmentTextDto): SegmentResponse {
    return {
      chunks: this.extractionService.segmentText(dto.text, dto.questionNumber),
    };
  }

  @Post('segment-pages')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Extract PDF pages and split them into sub-question chunks',
  })
  @ApiBody({ type: SegmentPagesDto })
  @ApiResponse({ status: 200, type: SegmentResponse })
  @ApiResponse({ status: 400, description: 'No content on the pages' })
  @ApiResponse({ status: 404, description: 'PDF not found' })
  async segmentPages(@Body() dto: SegmentPagesDto): Promise<SegmentResponse> {
    this.logger.log(
      `Segment pages request: ${dto.pdfPath} question ${dto.questionNumber}`,
    );
    return {
      chunks: await this.extractionService.segmentPages(
        dto.pdfPath,
        dto.pages,
        dto.questionNumber,
      ),
    };
  }
}
