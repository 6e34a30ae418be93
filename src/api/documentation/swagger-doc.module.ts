import { INestApplication, Module } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { HealthModule } from '../../health/health.module';
import { ApiModule } from '../api.module';

/**
 * Swagger documentation for the recommendation API.
 */
@Module({})
export class SwaggerDocModule {
  static setup(app: INestApplication, path: string): void {
    const options = new DocumentBuilder()
      .setTitle('GridScout API')
      .setDescription(
        'Ranks micro-grids of a region and evaluates arbitrary locations as sites for a new business.',
      )
      .setVersion('1.0')
      .addTag('Recommendations', 'Grid sweeps and point evaluations')
      .addTag('Regions', 'Region catalogue and per-grid metrics')
      .addTag('Grids', 'Grid explanations')
      .addTag('Health', 'Service health')
      .build();

    const document = SwaggerModule.createDocument(app, options, {
      include: [ApiModule, HealthModule],
      deepScanRoutes: true,
    });

    SwaggerModule.setup(path, app, document, {
      swaggerOptions: {
        docExpansion: 'list',
        filter: true,
        deepLinking: true,
      },
      customSiteTitle: 'GridScout API Documentation',
      customCss: '.swagger-ui .topbar { display: none }',
    });
  }
}
