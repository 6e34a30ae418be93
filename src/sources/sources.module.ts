import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import sourcesConfig, { dataSourceKind } from '../config/sources.config';
import { IN_MEMORY_DATASET, loadDataset } from './in-memory/dataset.loader';
import { InMemoryBusinessSource } from './in-memory/in-memory-business.source';
import { InMemorySocialSource } from './in-memory/in-memory-social.source';
import { BUSINESS_SOURCE, SOCIAL_SOURCE } from './interfaces/source.interface';
import { BusinessEntity } from './postgres/entities/business.entity';
import { SocialPostEntity } from './postgres/entities/social-post.entity';
import { PostgresBusinessSource } from './postgres/postgres-business.source';
import { PostgresSocialSource } from './postgres/postgres-social.source';

/**
 * Binds BUSINESS_SOURCE and SOCIAL_SOURCE to the backend chosen by
 * DATA_SOURCE: a JSON dataset held in memory, or PostgreSQL through TypeORM.
 * Imported once by the root module; the bindings are global.
 */
@Module({})
export class SourcesModule {
  static forRoot(): DynamicModule {
    return dataSourceKind() === 'postgres' ? SourcesModule.postgres() : SourcesModule.memory();
  }

  private static memory(): DynamicModule {
    return {
      module: SourcesModule,
      global: true,
      imports: [ConfigModule.forFeature(sourcesConfig)],
      providers: [
        {
          provide: IN_MEMORY_DATASET,
          useFactory: (config: ConfigType<typeof sourcesConfig>) => loadDataset(config.datasetFile),
          inject: [sourcesConfig.KEY],
        },
        InMemoryBusinessSource,
        InMemorySocialSource,
        { provide: BUSINESS_SOURCE, useExisting: InMemoryBusinessSource },
        { provide: SOCIAL_SOURCE, useExisting: InMemorySocialSource },
      ],
      exports: [BUSINESS_SOURCE, SOCIAL_SOURCE],
    };
  }

  private static postgres(): DynamicModule {
    return {
      module: SourcesModule,
      global: true,
      imports: [
        ConfigModule.forFeature(sourcesConfig),
        TypeOrmModule.forRootAsync({
          imports: [ConfigModule.forFeature(sourcesConfig)],
          useFactory: (config: ConfigType<typeof sourcesConfig>) => ({
            type: 'postgres' as const,
            host: config.postgres.host,
            port: config.postgres.port,
            database: config.postgres.database,
            username: config.postgres.username,
            password: config.postgres.password,
            entities: [BusinessEntity, SocialPostEntity],
            synchronize: false,
            logging: false,
            ssl: config.postgres.ssl ? { rejectUnauthorized: false } : false,
            extra: {
              max: 10,
              idleTimeoutMillis: 30000,
              connectionTimeoutMillis: 2000,
            },
          }),
          inject: [sourcesConfig.KEY],
        }),
        TypeOrmModule.forFeature([BusinessEntity, SocialPostEntity]),
      ],
      providers: [
        PostgresBusinessSource,
        PostgresSocialSource,
        { provide: BUSINESS_SOURCE, useExisting: PostgresBusinessSource },
        { provide: SOCIAL_SOURCE, useExisting: PostgresSocialSource },
      ],
      exports: [BUSINESS_SOURCE, SOCIAL_SOURCE],
    };
  }
}
