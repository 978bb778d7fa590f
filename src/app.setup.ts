import { INestApplication, ValidationPipe } from '@nestjs/common';
import type { ValidationError as ClassValidatorError } from 'class-validator';
import { ApiExceptionFilter } from './modules/utils/api-exception.filter';
import { CacheControlInterceptor } from './modules/utils/cache-control.interceptor';
import { ValidationError } from './modules/utils/domain.errors';

function describeErrors(errors: ClassValidatorError[]): string {
  return errors
    .flatMap((error) => Object.values(error.constraints ?? {}))
    .join('; ');
}

/**
 * Global pipes, filters and interceptors. Shared by bootstrap and the e2e specs.
 */
export function configureApp(app: INestApplication): void {
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
      whitelist: true,
      forbidNonWhitelisted: false,
      exceptionFactory: (errors) =>
        new ValidationError(
          'INVALID_QUERY',
          describeErrors(errors) || 'Invalid query parameters',
        ),
    }),
  );
  app.useGlobalFilters(app.get(ApiExceptionFilter));
  app.useGlobalInterceptors(app.get(CacheControlInterceptor));
}
