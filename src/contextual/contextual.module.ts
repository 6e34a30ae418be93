import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import contextualConfig from '../config/contextual.config';
import { HttpContextualEvaluator } from './http-contextual.evaluator';
import { CONTEXTUAL_EVALUATOR, ContextualEvaluator } from './interfaces/contextual.interface';
import { StubContextualEvaluator } from './stub-contextual.evaluator';

@Module({
  imports: [ConfigModule.forFeature(contextualConfig)],
  providers: [
    {
      provide: CONTEXTUAL_EVALUATOR,
      useFactory: (config: ConfigType<typeof contextualConfig>): ContextualEvaluator =>
        config.provider === 'http' ? new HttpContextualEvaluator(config) : new StubContextualEvaluator(),
      inject: [contextualConfig.KEY],
    },
  ],
  exports: [CONTEXTUAL_EVALUATOR],
})
export class ContextualModule {}
