/**
 * Root module
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AnnotationModule } from './annotation/annotation.module';
import configuration from './config/configuration';
import { ExtractionModule } from './extraction/extraction.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    ExtractionModule,
    AnnotationModule,
  ],
})
export class AppModule {}
