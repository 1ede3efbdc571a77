import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  CallHandler,
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import type { Request } from 'express';
import { diskStorage } from 'multer';
import { Observable, catchError, concatMap, defer, map, throwError } from 'rxjs';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { InvalidInputError, UploadTooLargeError, errorMessage } from './errors';

function storedName(originalName: string): string {
  const extension = path.extname(path.basename(originalName)).replace(/[^\w.]/g, '');
  return `${randomUUID()}${extension}`;
}

export function uploadsModule() {
  return MulterModule.registerAsync({
    inject: [APP_CONFIG],
    useFactory: (config: AppConfig) => ({
      storage: diskStorage({
        destination: config.uploadDir,
        filename: (_req, file, callback) => callback(null, storedName(file.originalname)),
      }),
      limits: { fileSize: config.maxUploadBytes },
    }),
  });
}

export function uploadedFiles(request: Request): Express.Multer.File[] {
  const files: Express.Multer.File[] = request.file ? [request.file] : [];
  if (Array.isArray(request.files)) {
    files.push(...request.files);
  } else if (request.files) {
    files.push(...Object.values(request.files).flat());
  }
  return files;
}

export function requireAudio(audio: Express.Multer.File | undefined): Express.Multer.File {
  if (!audio || !audio.originalname) {
    throw new InvalidInputError('Please upload an audio file.');
  }
  return audio;
}

/** Rejects requests whose declared body size is over the upload ceiling before multer reads them. */
@Injectable()
export class UploadSizeGuard implements CanActivate {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const declared = Number(request.headers['content-length'] ?? 0);
    if (declared > this.config.maxUploadBytes) {
      throw new UploadTooLargeError(this.config.maxUploadBytes);
    }
    return true;
  }
}

/** Deletes every file multer stored for the request before the response or error leaves the handler. */
@Injectable()
export class UploadCleanupInterceptor implements NestInterceptor {
  private readonly logger = new Logger(UploadCleanupInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const release = defer(() => this.release(request));
    return next.handle().pipe(
      concatMap((value) => release.pipe(map(() => value))),
      catchError((error: unknown) => release.pipe(concatMap(() => throwError(() => error)))),
    );
  }

  private async release(request: Request) {
    await Promise.all(
      uploadedFiles(request).map(async (file) => {
        try {
          await fs.rm(file.path, { force: true });
        } catch (error) {
          this.logger.warn(`Could not remove upload ${file.path}: ${errorMessage(error, 'unknown error')}`);
        }
      }),
    );
  }
}
