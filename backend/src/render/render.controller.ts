import { createReadStream } from 'node:fs';
import {
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  Post,
  StreamableFile,
  UploadedFile,
  UploadedFiles,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor, FileInterceptor } from '@nestjs/platform-express';
import { ToolUnavailableError, errorMessage } from '../common/errors';
import { UploadCleanupInterceptor, UploadSizeGuard, requireAudio } from '../common/uploads';
import { AnalysisReport, AnalysisService } from '../analysis/analysis.service';
import { AnalyzeAudioDto } from '../analysis/dto';
import { RenderDto } from './dto';
import { RenderService, RenderSource, TIMELINE_FILE_NAME, ToolReport } from './render.service';
import { createRenderWorkspace } from './workspace';

type UploadedMedia = Pick<Express.Multer.File, 'path' | 'originalname'>;

interface RenderUploads {
  audio?: Express.Multer.File[];
  videos?: UploadedMedia[];
  images?: UploadedMedia[];
}

export interface RenderSkipped {
  report: AnalysisReport;
  render: { status: 'skipped'; message: string };
}

export const NO_MEDIA_MESSAGE = 'No videos or PNGs were provided for rendering.';

/** Videos win over images; only PNG stills are used. */
export function selectRenderSource(uploads: Omit<RenderUploads, 'audio'>): RenderSource | null {
  const videos = uploads.videos ?? [];
  if (videos.length) {
    return { kind: 'videos', paths: videos.map((file) => file.path) };
  }
  const images = (uploads.images ?? []).filter((file) => file.originalname.toLowerCase().endsWith('.png'));
  if (images.length) {
    return { kind: 'images', paths: images.map((file) => file.path) };
  }
  return null;
}

interface Delivery {
  type: string;
  disposition: string;
}

@Controller()
export class RenderController {
  private readonly logger = new Logger(RenderController.name);

  constructor(
    private readonly renderService: RenderService,
    private readonly analysisService: AnalysisService,
  ) {}

  @Get('tools')
  async tools(): Promise<ToolReport> {
    return this.renderService.toolReport();
  }

  @Post('render')
  @HttpCode(200)
  @UseGuards(UploadSizeGuard)
  @UseInterceptors(
    UploadCleanupInterceptor,
    FileFieldsInterceptor([
      { name: 'audio', maxCount: 1 },
      { name: 'videos' },
      { name: 'images' },
    ]),
  )
  async render(
    @UploadedFiles() uploads: RenderUploads | undefined,
    @Body() dto: RenderDto,
  ): Promise<StreamableFile | RenderSkipped> {
    const audio = requireAudio(uploads?.audio?.[0]);
    const capability = await this.renderService.checkCapability();
    const report = await this.analysisService.analyze({ path: audio.path, originalName: audio.originalname }, dto);

    if (capability.status === 'unavailable') {
      return this.skipped(report, `Rendering skipped: ${capability.reason}`);
    }
    const source = selectRenderSource(uploads ?? {});
    if (!source) {
      return this.skipped(report, NO_MEDIA_MESSAGE);
    }

    return this.deliver(
      report,
      (workDir) =>
        this.renderService.render(
          {
            audioPath: audio.path,
            durationSec: report.durationSec,
            segments: report.segments,
            fps: dto.fps,
            aspectRatio: dto.aspectRatio,
            clipMode: dto.clipMode,
            source,
            workDir,
            outputName: dto.outputName,
          },
          capability,
        ),
      { type: 'video/mp4', disposition: `attachment; filename="${dto.outputName}"` },
    );
  }

  @Post('timeline')
  @HttpCode(200)
  @UseGuards(UploadSizeGuard)
  @UseInterceptors(UploadCleanupInterceptor, FileInterceptor('audio'))
  async timeline(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: AnalyzeAudioDto,
  ): Promise<StreamableFile | RenderSkipped> {
    const audio = requireAudio(file);
    const capability = await this.renderService.checkCapability();
    const report = await this.analysisService.analyze({ path: audio.path, originalName: audio.originalname }, dto);

    if (capability.status === 'unavailable') {
      return this.skipped(report, `Timeline skipped: ${capability.reason}`);
    }
    return this.deliver(
      report,
      (workDir) =>
        this.renderService.renderTimeline(
          {
            audioPath: audio.path,
            durationSec: report.durationSec,
            window: report.flashWindow,
            cuts: report.flash,
            workDir,
          },
          capability,
        ),
      { type: 'image/png', disposition: `inline; filename="${TIMELINE_FILE_NAME}"` },
    );
  }

  private skipped(report: AnalysisReport, message: string): RenderSkipped {
    this.logger.warn(message);
    return { report, render: { status: 'skipped', message } };
  }

  /** Streams the produced file and removes its work directory once the stream closes or production fails. */
  private async deliver(
    report: AnalysisReport,
    produce: (workDir: string) => Promise<string>,
    delivery: Delivery,
  ): Promise<StreamableFile | RenderSkipped> {
    const workspace = await createRenderWorkspace();
    const release = () => {
      workspace.cleanup().catch((error: unknown) => {
        this.logger.warn(`Could not remove ${workspace.dir}: ${errorMessage(error, 'unknown error')}`);
      });
    };

    try {
      const outputPath = await produce(workspace.dir);
      const stream = createReadStream(outputPath);
      stream.once('close', release);
      return new StreamableFile(stream, delivery);
    } catch (error) {
      release();
      if (error instanceof ToolUnavailableError) {
        return this.skipped(report, `Rendering skipped: ${error.message}`);
      }
      throw error;
    }
  }
}
