import { IsArray, IsNumber, IsOptional, IsPositive, Max, Min } from 'class-validator';

export class BuildSegmentsDto {
  @IsArray()
  @IsNumber({}, { each: true })
  onsets!: number[];

  @IsNumber()
  durationSec!: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  minGapSec?: number;

  @IsOptional()
  @IsNumber()
  @Min(0.1)
  @Max(10)
  maxGapSec?: number;

  @IsOptional()
  @IsPositive()
  fps?: number;
}
