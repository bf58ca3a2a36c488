import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ValidationException } from './common/exceptions';
import { flattenValidationErrors } from './transliteration/settings-validator';

/**
 * Request validation shared by the server and the e2e tests
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: (errors) =>
      new ValidationException('Request body is malformed', flattenValidationErrors(errors)),
  });
}

export function configureApp(app: INestApplication): void {
  // Global API prefix for versioning
  app.setGlobalPrefix('api/v1');
  app.useGlobalPipes(createValidationPipe());
}
