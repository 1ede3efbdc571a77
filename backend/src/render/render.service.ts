import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { RenderFailureError, errorMessage } from '../common/errors';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { COMMAND_RUNNER, CommandOptions, CommandResult, CommandRunner } from '../media/command-runner';
import {
  AspectRatio,
  ClipMode,
  FALLBACK_MEDIA_META,
  MediaMeta,
  concatArgs,
  concatListText,
  imageClipArgs,
  muxArgs,
  parseProbeOutput,
  probeArgs,
  timelineArgs,
  videoClipArgs,
} from '../media/ffmpeg';
import { Segment, assertPartition } from '../segments/segment-builder';

export type ToolCapability =
  | { status: 'available'; ffmpegPath: string; ffprobePath: string; version: string }
  | { status: 'unavailable'; reason: string };

export type AvailableTool = Extract<ToolCapability, { status: 'available' }>;

export type RenderSource = { kind: 'videos'; paths: string[] } | { kind: 'images'; paths: string[] };

export interface RenderJob {
  audioPath: string;
  durationSec: number;
  segments: Segment[];
  fps: number;
  aspectRatio: AspectRatio;
  clipMode: ClipMode;
  source: RenderSource;
  workDir: string;
  outputName: string;
}

export interface TimelineJob {
  audioPath: string;
  durationSec: number;
  window: [number, number];
  cuts: number[];
  workDir: string;
}

export const TIMELINE_FILE_NAME = 'waveform.png';

export interface ToolStatus {
  path: string;
  available: boolean;
  version: string | null;
  error: string | null;
}

export interface ToolReport {
  ffmpeg: ToolStatus;
  ffprobe: ToolStatus;
  timestamp: string;
}

@Injectable()
export class RenderService {
  private readonly logger = new Logger(RenderService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(COMMAND_RUNNER) private readonly runner: CommandRunner,
  ) {}

  async checkCapability(): Promise<ToolCapability> {
    const ffmpeg = await this.toolStatus(this.config.ffmpegPath);
    if (!ffmpeg.available) {
      return { status: 'unavailable', reason: ffmpeg.error ?? 'ffmpeg is not available' };
    }
    return {
      status: 'available',
      ffmpegPath: this.config.ffmpegPath,
      ffprobePath: this.config.ffprobePath,
      version: ffmpeg.version ?? 'unknown',
    };
  }

  async toolReport(): Promise<ToolReport> {
    const [ffmpeg, ffprobe] = await Promise.all([
      this.toolStatus(this.config.ffmpegPath),
      this.toolStatus(this.config.ffprobePath),
    ]);
    return { ffmpeg, ffprobe, timestamp: new Date().toISOString() };
  }

  async probeMediaMeta(tool: AvailableTool, mediaPath: string): Promise<MediaMeta> {
    try {
      const result = await this.runner.run(tool.ffprobePath, probeArgs(mediaPath));
      if (result.code !== 0) {
        this.logger.warn(`ffprobe failed for ${mediaPath}: ${result.stderr.trim()}`);
        return { ...FALLBACK_MEDIA_META };
      }
      return parseProbeOutput(result.stdout.toString('utf8'));
    } catch (error) {
      this.logger.warn(`ffprobe unavailable for ${mediaPath}: ${errorMessage(error, 'unknown error')}`);
      return { ...FALLBACK_MEDIA_META };
    }
  }

  /** Renders one clip per segment, concatenates them and muxes the audio; returns the output path. */
  async render(job: RenderJob, tool: AvailableTool): Promise<string> {
    assertPartition(job.segments, job.durationSec);
    const clipDir = path.join(job.workDir, '_preconv');
    await fs.mkdir(clipDir, { recursive: true });

    const { paths } = job.source;
    const durations = new Map<string, number>();
    const clipNames: string[] = [];

    for (const [index, segment] of job.segments.entries()) {
      const lengthSec = Math.max(1 / job.fps, segment.end - segment.start);
      const source = paths[index % paths.length];
      const name = `seg_${String(index + 1).padStart(4, '0')}.mp4`;
      const outputPath = path.join(clipDir, name);

      let args: string[];
      if (job.source.kind === 'videos') {
        let sourceDurationSec = durations.get(source);
        if (sourceDurationSec === undefined) {
          sourceDurationSec = (await this.probeMediaMeta(tool, source)).durationSec;
          durations.set(source, sourceDurationSec);
        }
        args = videoClipArgs({
          source,
          sourceDurationSec,
          lengthSec,
          clipMode: job.clipMode,
          fps: job.fps,
          aspectRatio: job.aspectRatio,
          outputPath,
        });
      } else {
        args = imageClipArgs({ source, lengthSec, fps: job.fps, aspectRatio: job.aspectRatio, outputPath });
      }

      await this.exec(tool.ffmpegPath, args);
      clipNames.push(name);
    }

    await fs.writeFile(path.join(clipDir, 'list.txt'), concatListText(clipNames), 'utf8');
    await this.exec(tool.ffmpegPath, concatArgs('list.txt', job.fps, 'video.mp4'), { cwd: clipDir });

    const outputPath = path.join(job.workDir, job.outputName);
    await this.exec(tool.ffmpegPath, muxArgs(path.join(clipDir, 'video.mp4'), job.audioPath, outputPath));
    this.logger.log(`Rendered ${clipNames.length} clips into ${job.outputName}`);
    return outputPath;
  }

  async renderTimeline(job: TimelineJob, tool: AvailableTool): Promise<string> {
    const outputPath = path.join(job.workDir, TIMELINE_FILE_NAME);
    await this.exec(
      tool.ffmpegPath,
      timelineArgs({
        audioPath: job.audioPath,
        durationSec: job.durationSec,
        window: job.window,
        cuts: job.cuts,
        outputPath,
      }),
    );
    this.logger.log(`Rendered timeline with ${job.cuts.length} flash cuts`);
    return outputPath;
  }

  private async toolStatus(toolPath: string): Promise<ToolStatus> {
    try {
      const result = await this.runner.run(toolPath, ['-version']);
      if (result.code !== 0) {
        return {
          path: toolPath,
          available: false,
          version: null,
          error: `${toolPath} -version exited with code ${result.code}`,
        };
      }
      const version = result.stdout.toString('utf8').split('\n')[0]?.trim() || null;
      return { path: toolPath, available: true, version, error: null };
    } catch (error) {
      return { path: toolPath, available: false, version: null, error: errorMessage(error, 'unknown error') };
    }
  }

  private async exec(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    const result = await this.runner.run(command, args, options);
    if (result.code !== 0) {
      const commandLine = [command, ...args];
      this.logger.error(`Command failed (exit ${result.code}): ${commandLine.join(' ')}\n${result.stderr}`);
      throw new RenderFailureError(
        `ffmpeg render failed (exit ${result.code}): ${result.stderr.trim().split('\n').pop() ?? ''}`,
        commandLine,
        result.stderr,
      );
    }
    return result;
  }
}
