import { Module } from '@nestjs/common';
import { ContextualModule } from '../contextual/contextual.module';
import { GridModule } from '../grid/grid.module';
import { HealthController } from './health.controller';

@Module({
  imports: [GridModule, ContextualModule],
  controllers: [HealthController],
})
export class HealthModule {}
