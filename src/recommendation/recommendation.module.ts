import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import contextualConfig from '../config/contextual.config';
import scoringConfig from '../config/scoring.config';
import { ContextualModule } from '../contextual/contextual.module';
import { EnvironmentModule } from '../environment/environment.module';
import { ExplainabilityModule } from '../explainability/explainability.module';
import { GridModule } from '../grid/grid.module';
import { MetricsModule } from '../metrics/metrics.module';
import { ScoringModule } from '../scoring/scoring.module';
import { RecommendationPipelineService } from './recommendation-pipeline.service';

@Module({
  imports: [
    ConfigModule.forFeature(scoringConfig),
    ConfigModule.forFeature(contextualConfig),
    GridModule,
    MetricsModule,
    EnvironmentModule,
    ScoringModule,
    ContextualModule,
    ExplainabilityModule,
  ],
  providers: [RecommendationPipelineService],
  exports: [RecommendationPipelineService],
})
export class RecommendationModule {}
