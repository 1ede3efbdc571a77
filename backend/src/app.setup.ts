import { INestApplication } from '@nestjs/common';
import { AppExceptionFilter } from './common/app-exception.filter';
import { createValidationPipe } from './common/validation';

export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new AppExceptionFilter());
  return app;
}
