import { Module } from '@nestjs/common';
import { SegmentsController } from './segments.controller';

@Module({
  controllers: [SegmentsController],
})
export class SegmentsModule {}
