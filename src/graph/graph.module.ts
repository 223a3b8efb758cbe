import { Module } from '@nestjs/common';
import { GraphStoreModule } from '../graph-store/graph-store.module';
import { PermissionsModule } from '../permissions/permissions.module';
import { SyncModule } from '../sync/sync.module';
import { GraphController } from './graph.controller';
import { GraphService } from './graph.service';

@Module({
  imports: [GraphStoreModule, PermissionsModule, SyncModule],
  controllers: [GraphController],
  providers: [GraphService],
})
export class GraphModule {}
