import { Module } from '@nestjs/common';
import { RecommendationModule } from '../recommendation/recommendation.module';
import { GridsController } from './controllers/grids.controller';
import { RecommendationsController } from './controllers/recommendations.controller';
import { RegionsController } from './controllers/regions.controller';

@Module({
  imports: [RecommendationModule],
  controllers: [RecommendationsController, RegionsController, GridsController],
})
export class ApiModule {}
