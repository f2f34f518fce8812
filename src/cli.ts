#!/usr/bin/env node
/**
 * Command-line entry point
 * annotate-script <input.pdf> <grades.json> <student-name> [output-dir]
 */

import 'dotenv/config';
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AnnotationService } from './annotation/annotation.service';
import { AppModule } from './app.module';
import { logLevelsFromEnv } from './config/configuration';

async function main(): Promise<number> {
  const [inputPdfPath, gradesPath, studentName, outputDir] = process.argv.slice(2);

  if (!inputPdfPath || !gradesPath || !studentName) {
    console.error(
      'Usage: annotate-script <input.pdf> <grades.json> <student-name> [output-dir]',
    );
    console.error(
      'Example: annotate-script scripts/jane-doe.pdf grades/jane-doe.json Jane-Doe annotations',
    );
    return 1;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevelsFromEnv(),
  });
  try {
    const result = await app.get(AnnotationService).annotate({
      inputPdfPath,
      gradesPath,
      studentName,
      outputDir,
    });

    const { report } = result;
    console.log(
      `Pages: ${report.pagesProcessed}, scores: ${report.scoresPlaced}, comments: ${report.commentsPlaced} ` +
        `(${report.commentsTruncated} truncated), ticks: ${report.ticksPlaced}, ` +
        `underlines: ${report.underlinesDrawn}, unmatched lines: ${report.linesUnmatched}`,
    );

    if (!result.success) {
      console.error(`Annotation failed: ${result.reason ?? 'unknown error'}`);
      return 1;
    }
    console.log(`Annotated PDF: ${result.outputPath}`);
    return 0;
  } finally {
    await app.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    new Logger('Cli').error(
      error instanceof Error ? (error.stack ?? error.message) : String(error),
    );
    process.exitCode = 1;
  });
