import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as express from 'express';
import { DomainExceptionFilter } from './common/filters/domain-exception.filter';

/**
 * Middleware, pipes and filters shared by the server and the e2e tests.
 */
export function configureApp(app: INestApplication): void {
  const configService = app.get(ConfigService);

  // Batch evaluations can carry many locations
  const expressApp = app.getHttpAdapter().getInstance();
  expressApp.use(express.json({ limit: configService.get<string>('BODY_LIMIT', '1mb') }));
  expressApp.use(
    express.urlencoded({ limit: configService.get<string>('BODY_LIMIT', '1mb'), extended: true }),
  );

  app.enableCors({
    origin: configService.get<string>('CORS_ORIGIN', '*'),
  });

  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new DomainExceptionFilter());
}
