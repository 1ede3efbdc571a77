import { Global, Module } from '@nestjs/common';
import { COMMAND_RUNNER, SpawnCommandRunner } from './command-runner';

@Global()
@Module({
  providers: [{ provide: COMMAND_RUNNER, useClass: SpawnCommandRunner }],
  exports: [COMMAND_RUNNER],
})
export class MediaModule {}
