import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { syncConfig } from '../config/sync.config';
import { GroupingEngine } from './grouping-engine';
import { GROUPING_OPTIONS, GroupingOptions } from './grouping.types';

@Module({
  imports: [ConfigModule.forFeature(syncConfig)],
  providers: [
    {
      provide: GROUPING_OPTIONS,
      inject: [syncConfig.KEY],
      useFactory: (config: ConfigType<typeof syncConfig>): GroupingOptions => ({
        maxDepth: config.groupMaxDepth,
        layout: {
          radius: config.expandRadius,
          clearance: config.expandClearance,
          angleCount: config.expandAngles,
        },
      }),
    },
    GroupingEngine,
  ],
  exports: [GroupingEngine],
})
export class GroupingModule {}
