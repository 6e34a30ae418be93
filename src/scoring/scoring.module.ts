import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import scoringConfig from '../config/scoring.config';
import { OpportunityScorerService } from './opportunity-scorer.service';
import { RuleEngineService } from './rule-engine.service';
import { ScoreCombinerService } from './score-combiner.service';

@Module({
  imports: [ConfigModule.forFeature(scoringConfig)],
  providers: [RuleEngineService, OpportunityScorerService, ScoreCombinerService],
  exports: [RuleEngineService, OpportunityScorerService, ScoreCombinerService],
})
export class ScoringModule {}
