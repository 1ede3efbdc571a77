import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { APP_CONFIG, AppConfig, usesDefaultSecret } from './config/app-config';
import { RenderService } from './render/render.service';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));
  const config = app.get<AppConfig>(APP_CONFIG);

  if (config.production && usesDefaultSecret(config)) {
    logger.warn('SESSION_SECRET is not set; using the development default in production');
  }

  const capability = await app.get(RenderService).checkCapability();
  if (capability.status === 'available') {
    logger.log(`Using ffmpeg: ${capability.ffmpegPath} (${capability.version})`);
  } else {
    logger.warn(`Rendering disabled: ${capability.reason}`);
  }

  await app.listen(config.port, '0.0.0.0');
  logger.log(`Listening on port ${config.port} with the ${config.analyzerMode} onset analyzer`);
}

bootstrap().catch((error: unknown) => {
  logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  process.exit(1);
});
