import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { BuildSegmentsDto } from './dto';
import { Segment, buildSegments } from './segment-builder';

@Controller('segments')
export class SegmentsController {
  @Post()
  @HttpCode(200)
  build(@Body() dto: BuildSegmentsDto): { segments: Segment[] } {
    const segments = buildSegments(dto.onsets, dto.durationSec, {
      minGapSec: dto.minGapSec,
      maxGapSec: dto.maxGapSec,
      fps: dto.fps,
    });
    return { segments };
  }
}
