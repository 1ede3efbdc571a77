import { AnalysisFailureError, EmptyAudioError, ToolUnavailableError } from '../../common/errors';
import { CommandResult, CommandRunner } from '../../media/command-runner';
import { decodePcmArgs } from '../../media/ffmpeg';
import { IOnsetAnalyzer, OnsetAnalysis, OnsetAnalyzeOptions } from './IOnsetAnalyzer';
import { detectOnsetEvents } from './onset-envelope';

export const ANALYSIS_SAMPLE_RATE = 22050;

export function pcmFromBuffer(buffer: Buffer): Float32Array {
  const samples = new Float32Array(Math.floor(buffer.length / 4));
  for (let i = 0; i < samples.length; i += 1) {
    samples[i] = buffer.readFloatLE(i * 4);
  }
  return samples;
}

/** Decodes audio through ffmpeg and detects onsets in process. */
export class FluxOnsetAnalyzer implements IOnsetAnalyzer {
  constructor(
    private readonly runner: CommandRunner,
    private readonly ffmpegPath: string,
    private readonly sampleRate = ANALYSIS_SAMPLE_RATE,
  ) {}

  async analyze(audioPath: string, options: OnsetAnalyzeOptions): Promise<OnsetAnalysis> {
    const samples = await this.decode(audioPath, options);
    if (!samples.length) {
      if (options.window) {
        return { durationSec: 0, onsets: [] };
      }
      throw new EmptyAudioError('Audio contains no samples; duration could not be determined');
    }

    const offset = options.window?.startSec ?? 0;
    const onsets = detectOnsetEvents(samples, this.sampleRate, { threshold: options.threshold }).map(
      (event) => ({ ...event, time: event.time + offset }),
    );
    return { durationSec: samples.length / this.sampleRate, onsets };
  }

  private async decode(audioPath: string, options: OnsetAnalyzeOptions): Promise<Float32Array> {
    let result: CommandResult;
    try {
      result = await this.runner.run(this.ffmpegPath, decodePcmArgs(audioPath, this.sampleRate, options.window));
    } catch (error) {
      if (error instanceof ToolUnavailableError) {
        throw new AnalysisFailureError(
          'Failed to read audio: ffmpeg is required to decode uploads. Install it or set FFMPEG_PATH.',
          { cause: error },
        );
      }
      throw error;
    }

    if (result.code !== 0) {
      throw new AnalysisFailureError(`Failed to read audio (ffmpeg exit ${result.code}): ${result.stderr.trim()}`);
    }
    return pcmFromBuffer(result.stdout);
  }
}
