import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import sourcesConfig from '../config/sources.config';
import { BevGeneratorService } from './bev-generator.service';
import { loadPlaceBucketCatalog, PLACE_BUCKETS } from './place-bucket.catalog';

@Module({
  imports: [ConfigModule.forFeature(sourcesConfig)],
  providers: [
    {
      provide: PLACE_BUCKETS,
      useFactory: (config: ConfigType<typeof sourcesConfig>) =>
        loadPlaceBucketCatalog(config.placeBucketsFile),
      inject: [sourcesConfig.KEY],
    },
    BevGeneratorService,
  ],
  exports: [BevGeneratorService],
})
export class EnvironmentModule {}
