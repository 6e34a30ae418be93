import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ApiModule } from './api/api.module';
import contextualConfig from './config/contextual.config';
import gridConfig from './config/grid.config';
import scoringConfig from './config/scoring.config';
import sourcesConfig from './config/sources.config';
import { HealthModule } from './health/health.module';
import { SourcesModule } from './sources/sources.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [gridConfig, scoringConfig, contextualConfig, sourcesConfig],
    }),
    // Global BUSINESS_SOURCE / SOCIAL_SOURCE bindings
    SourcesModule.forRoot(),
    HealthModule,
    ApiModule,
  ],
})
export class AppModule {}
