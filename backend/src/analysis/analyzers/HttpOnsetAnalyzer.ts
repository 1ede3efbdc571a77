import { Type, plainToInstance } from 'class-transformer';
import { IsArray, IsNumber, Max, Min, ValidateNested, validate } from 'class-validator';
import { Dispatcher, fetch } from 'undici';
import { AnalysisFailureError, EmptyAudioError } from '../../common/errors';
import { AnalysisWindow, IOnsetAnalyzer, OnsetAnalysis, OnsetAnalyzeOptions } from './IOnsetAnalyzer';

export interface AnalyzerRequest {
  audioPath: string;
  threshold: number;
  window: AnalysisWindow | null;
}

class OnsetEventPayload {
  @IsNumber()
  @Min(0)
  time!: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  confidence!: number;
}

class AnalyzerResponse {
  @IsNumber()
  @Min(0)
  durationSec!: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => OnsetEventPayload)
  onsets!: OnsetEventPayload[];
}

/** Delegates onset detection to an external analysis service over HTTP. */
export class HttpOnsetAnalyzer implements IOnsetAnalyzer {
  constructor(
    private readonly endpoint: string,
    private readonly timeoutMs: number,
    private readonly dispatcher?: Dispatcher,
  ) {}

  async analyze(audioPath: string, options: OnsetAnalyzeOptions): Promise<OnsetAnalysis> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let body: unknown;
    try {
      const response = await fetch(`${this.endpoint}/onsets`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          audioPath,
          threshold: options.threshold,
          window: options.window ?? null,
        } satisfies AnalyzerRequest),
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      if (!response.ok) {
        throw new AnalysisFailureError(`Analyzer error ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof AnalysisFailureError) {
        throw error;
      }
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs} ms`
        : error instanceof Error
          ? error.message
          : 'request failed';
      throw new AnalysisFailureError(`Analyzer unreachable: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      throw new AnalysisFailureError('Analyzer returned a non-object payload');
    }
    const payload = plainToInstance(AnalyzerResponse, body);
    const errors = await validate(payload);
    if (errors.length) {
      throw new AnalysisFailureError(`Analyzer returned an invalid payload: ${errors.map(String).join('; ')}`);
    }
    if (payload.durationSec <= 0 && !options.window) {
      throw new EmptyAudioError('Analyzer could not determine the audio duration');
    }

    return {
      durationSec: payload.durationSec,
      onsets: payload.onsets
        .map((onset) => ({ time: onset.time, confidence: onset.confidence }))
        .sort((a, b) => a.time - b.time),
    };
  }
}
