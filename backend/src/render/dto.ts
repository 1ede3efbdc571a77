import { Transform } from 'class-transformer';
import { IsIn, IsString, Matches } from 'class-validator';
import { AnalyzeAudioDto } from '../analysis/dto';
import { ASPECT_RATIOS, AspectRatio, ClipMode } from '../media/ffmpeg';

export class RenderDto extends AnalyzeAudioDto {
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @IsIn(['head', 'tail'])
  clipMode: ClipMode = 'head';

  @IsIn(Object.keys(ASPECT_RATIOS))
  aspectRatio: AspectRatio = '16:9';

  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @Matches(/^[\w.-]+\.mp4$/, { message: 'outputName must be a plain file name ending in .mp4' })
  outputName = 'final_video.mp4';
}
