import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
  PayloadTooLargeException,
} from '@nestjs/common';
import type { Response } from 'express';
import { AppError, AppErrorCode } from './errors';

export interface ErrorBody {
  error: string;
  message: string;
}

// ToolUnavailable has no status: rendering reports it as skipped, anything else is unexpected.
const STATUS_BY_CODE: Record<Exclude<AppErrorCode, 'ToolUnavailable'>, number> = {
  InvalidInput: HttpStatus.BAD_REQUEST,
  EmptyAudio: HttpStatus.UNPROCESSABLE_ENTITY,
  UploadTooLarge: HttpStatus.PAYLOAD_TOO_LARGE,
  AnalysisFailure: HttpStatus.BAD_GATEWAY,
  RenderFailure: HttpStatus.INTERNAL_SERVER_ERROR,
};

function httpExceptionMessage(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return response;
  }
  const message: unknown = Reflect.get(response, 'message');
  if (Array.isArray(message)) {
    return message.join('; ');
  }
  return typeof message === 'string' ? message : exception.message;
}

@Catch()
export class AppExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AppExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const [status, body] = this.describe(exception);

    if (response.headersSent) {
      this.logger.error(`Error after response started: ${body.message}`);
      response.end();
      return;
    }
    response.status(status).json(body);
  }

  describe(exception: unknown): [number, ErrorBody] {
    if (exception instanceof AppError && exception.code !== 'ToolUnavailable') {
      return [STATUS_BY_CODE[exception.code], { error: exception.code, message: exception.message }];
    }
    if (exception instanceof PayloadTooLargeException) {
      return [HttpStatus.PAYLOAD_TOO_LARGE, { error: 'UploadTooLarge', message: httpExceptionMessage(exception) }];
    }
    if (exception instanceof BadRequestException) {
      return [HttpStatus.BAD_REQUEST, { error: 'InvalidInput', message: httpExceptionMessage(exception) }];
    }
    if (exception instanceof HttpException) {
      return [
        exception.getStatus(),
        { error: exception.name.replace(/Exception$/, ''), message: httpExceptionMessage(exception) },
      ];
    }

    this.logger.error(
      exception instanceof Error ? exception.message : 'Unknown error',
      exception instanceof Error ? exception.stack : undefined,
    );
    return [HttpStatus.INTERNAL_SERVER_ERROR, { error: 'InternalError', message: 'Internal server error' }];
  }
}
