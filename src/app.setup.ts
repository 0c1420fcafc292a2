import { INestApplication, ValidationError, ValidationPipe } from '@nestjs/common';
import helmet from 'helmet';
import { InvalidInputError } from './common/exceptions';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';

export const GLOBAL_PREFIX = 'api/v1';

function flattenValidationErrors(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...flattenValidationErrors(error.children ?? []),
  ]);
}

export function parseCorsOrigins(raw: string | undefined, isProd: boolean): string[] | true {
  const origins = (raw ?? '')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  if (origins.length > 0) {
    return origins;
  }
  if (isProd) {
    throw new Error('SECURITY: CORS_ORIGINS must be configured in production environments.');
  }
  // Allow all in development
  return true;
}

/**
 * Applies the HTTP pipeline shared by the server and the e2e tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  // Security: Apply Helmet for HTTP security headers
  app.use(helmet());

  app.setGlobalPrefix(GLOBAL_PREFIX);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
      exceptionFactory: (errors) => new InvalidInputError(flattenValidationErrors(errors).join(', ')),
    }),
  );

  app.useGlobalFilters(new AllExceptionsFilter());

  app.enableCors({
    origin: parseCorsOrigins(process.env.CORS_ORIGINS, process.env.NODE_ENV === 'production'),
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Trace-ID'],
    exposedHeaders: ['X-Trace-ID'],
  });

  return app;
}
