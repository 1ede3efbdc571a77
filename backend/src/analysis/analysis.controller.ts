import {
  Body,
  Controller,
  HttpCode,
  Post,
  Query,
  Res,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import type { Response } from 'express';
import { UploadCleanupInterceptor, UploadSizeGuard, requireAudio } from '../common/uploads';
import { toCutSheetCsv } from '../segments/cut-sheet';
import { AnalysisReport, AnalysisService } from './analysis.service';
import { AnalyzeAudioDto } from './dto';

@Controller()
export class AnalysisController {
  constructor(private readonly analysisService: AnalysisService) {}

  @Post('analyze')
  @HttpCode(200)
  @UseGuards(UploadSizeGuard)
  @UseInterceptors(UploadCleanupInterceptor, FileInterceptor('audio'))
  async analyze(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: AnalyzeAudioDto,
    @Query('format') format: string | undefined,
    @Res({ passthrough: true }) res: Response,
  ): Promise<AnalysisReport | string> {
    const audio = requireAudio(file);
    const report = await this.analysisService.analyze(
      { path: audio.path, originalName: audio.originalname },
      dto,
    );
    if (format === 'csv') {
      res.type('text/csv');
      return toCutSheetCsv(report.segments);
    }
    return report;
  }
}
