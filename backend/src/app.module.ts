import { Module } from '@nestjs/common';
import { AnalysisModule } from './analysis/analysis.module';
import { ConfigModule } from './config/config.module';
import { HealthModule } from './health/health.module';
import { MediaModule } from './media/media.module';
import { RenderModule } from './render/render.module';
import { SegmentsModule } from './segments/segments.module';

@Module({
  imports: [ConfigModule, MediaModule, HealthModule, SegmentsModule, AnalysisModule, RenderModule],
})
export class AppModule {}
