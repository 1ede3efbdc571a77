import { Module } from '@nestjs/common';
import { uploadsModule } from '../common/uploads';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { COMMAND_RUNNER, CommandRunner } from '../media/command-runner';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { FluxOnsetAnalyzer } from './analyzers/FluxOnsetAnalyzer';
import { HttpOnsetAnalyzer } from './analyzers/HttpOnsetAnalyzer';
import { IOnsetAnalyzer, ONSET_ANALYZER } from './analyzers/IOnsetAnalyzer';

export function createOnsetAnalyzer(config: AppConfig, runner: CommandRunner): IOnsetAnalyzer {
  if (config.analyzerMode === 'http') {
    return new HttpOnsetAnalyzer(config.analyzerEndpoint, config.analyzerTimeoutMs);
  }
  return new FluxOnsetAnalyzer(runner, config.ffmpegPath);
}

@Module({
  imports: [uploadsModule()],
  controllers: [AnalysisController],
  providers: [
    AnalysisService,
    { provide: ONSET_ANALYZER, inject: [APP_CONFIG, COMMAND_RUNNER], useFactory: createOnsetAnalyzer },
  ],
  exports: [AnalysisService],
})
export class AnalysisModule {}
