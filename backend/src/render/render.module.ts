import { Module } from '@nestjs/common';
import { AnalysisModule } from '../analysis/analysis.module';
import { uploadsModule } from '../common/uploads';
import { RenderController } from './render.controller';
import { RenderService } from './render.service';

@Module({
  imports: [AnalysisModule, uploadsModule()],
  controllers: [RenderController],
  providers: [RenderService],
  exports: [RenderService],
})
export class RenderModule {}
