import { Type } from 'class-transformer';
import { IsNumber, Max, Min } from 'class-validator';

/** Multipart form fields arrive as strings and are coerced here. */
export class AnalyzeAudioDto {
  @Type(() => Number)
  @IsNumber()
  @Min(10)
  @Max(120)
  fps = 30;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(1)
  threshold = 0.3;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  minGap = 0.1;

  @Type(() => Number)
  @IsNumber()
  @Min(0.1)
  @Max(10)
  maxGap = 5;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  flashStart = 10;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  flashEnd = 25;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  flashGap = 0.12;
}

export type AnalysisParams = Pick<
  AnalyzeAudioDto,
  'fps' | 'threshold' | 'minGap' | 'maxGap' | 'flashStart' | 'flashEnd' | 'flashGap'
>;
