import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { SwaggerDocModule } from './api/documentation/swagger-doc.module';
import { AppModule } from './app.module';
import { configureApp } from './configure-app';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  configureApp(app);

  if (configService.get<string>('ENABLE_SWAGGER', 'true') !== 'false') {
    SwaggerDocModule.setup(app, configService.get<string>('DOCS_PATH', 'api/docs'));
  }

  const port = Number(configService.get<string>('PORT', '3000'));
  const host = configService.get<string>('HOST', '0.0.0.0');

  await app.listen(port, host);
  logger.log(`Application is running on: ${await app.getUrl()}`);
}

bootstrap().catch(error => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
