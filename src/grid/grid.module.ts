import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import gridConfig from '../config/grid.config';
import { GridPartitionerService } from './grid-partitioner.service';
import { GridStoreService } from './grid-store.service';
import { PointToGridAssignerService } from './point-to-grid-assigner.service';

@Module({
  imports: [ConfigModule.forFeature(gridConfig)],
  providers: [GridPartitionerService, PointToGridAssignerService, GridStoreService],
  exports: [GridPartitionerService, PointToGridAssignerService, GridStoreService],
})
export class GridModule {}
