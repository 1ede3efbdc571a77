import { Inject, Injectable, Logger } from '@nestjs/common';
import { AnalysisFailureError, AppError, errorMessage } from '../common/errors';
import { injectCutPoints, pruneFlashTimes } from '../segments/cut-points';
import { Segment, buildSegments } from '../segments/segment-builder';
import { AnalysisParams } from './dto';
import {
  IOnsetAnalyzer,
  ONSET_ANALYZER,
  OnsetAnalysis,
  OnsetAnalyzeOptions,
  OnsetEvent,
} from './analyzers/IOnsetAnalyzer';

export interface UploadedAudio {
  path: string;
  originalName: string;
}

export interface AnalysisReport {
  audio: string;
  durationSec: number;
  fps: number;
  threshold: number;
  minGapSec: number;
  maxGapSec: number;
  onsets: OnsetEvent[];
  segments: Segment[];
  flash: number[];
  flashWindow: [number, number];
}

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(@Inject(ONSET_ANALYZER) private readonly analyzer: IOnsetAnalyzer) {}

  async analyze(audio: UploadedAudio, params: AnalysisParams): Promise<AnalysisReport> {
    const analysis = await this.detect(audio.path, { threshold: params.threshold });
    const { durationSec, onsets } = analysis;
    if (onsets.some((onset) => onset.time > durationSec)) {
      throw new AnalysisFailureError(`Analyzer reported onsets past the end of the audio (${durationSec}s)`);
    }

    let segments = buildSegments(
      onsets.map((onset) => onset.time),
      durationSec,
      { minGapSec: params.minGap, maxGapSec: params.maxGap, fps: params.fps },
    );

    let flash: number[] = [];
    const flashEnd = Math.min(params.flashEnd, durationSec);
    if (flashEnd > params.flashStart) {
      const windowed = await this.detect(audio.path, {
        threshold: params.threshold,
        window: { startSec: params.flashStart, endSec: flashEnd },
      });
      flash = pruneFlashTimes(
        windowed.onsets.map((onset) => onset.time),
        { minGapSec: params.flashGap, fps: params.fps },
      );
      segments = injectCutPoints(segments, flash, 1 / params.fps);
    }

    this.logger.log(
      `${audio.originalName}: ${durationSec.toFixed(2)}s, ${onsets.length} onsets, ` +
        `${segments.length} segments, ${flash.length} flash cuts`,
    );

    return {
      audio: audio.originalName,
      durationSec,
      fps: params.fps,
      threshold: params.threshold,
      minGapSec: params.minGap,
      maxGapSec: params.maxGap,
      onsets,
      segments,
      flash,
      flashWindow: [params.flashStart, params.flashEnd],
    };
  }

  private async detect(audioPath: string, options: OnsetAnalyzeOptions): Promise<OnsetAnalysis> {
    try {
      return await this.analyzer.analyze(audioPath, options);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new AnalysisFailureError(errorMessage(error, 'Onset analysis failed'), { cause: error });
    }
  }
}
