import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { GraphExceptionFilter } from './common/filters/graph-exception.filter';
import { syncConfig } from './config/sync.config';
import { DatabaseModule } from './database/database.module';
import { GraphModule } from './graph/graph.module';
import { HealthController } from './health.controller';
import { RedisModule } from './redis/redis.module';
import { SyncModule } from './sync/sync.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [syncConfig],
    }),
    DatabaseModule,
    RedisModule,
    SyncModule,
    GraphModule,
  ],
  controllers: [HealthController],
  providers: [{ provide: APP_FILTER, useClass: GraphExceptionFilter }],
})
export class AppModule {}
