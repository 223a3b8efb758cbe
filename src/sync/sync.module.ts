import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { syncConfig } from '../config/sync.config';
import { GraphStoreModule } from '../graph-store/graph-store.module';
import { PermissionsModule } from '../permissions/permissions.module';
import { SessionsModule } from '../sessions/sessions.module';
import { OntologyGateway } from './ontology.gateway';
import { PresenceMonitorService } from './presence-monitor.service';
import { SyncHubService } from './sync-hub.service';

@Module({
  imports: [
    ConfigModule.forFeature(syncConfig),
    GraphStoreModule,
    PermissionsModule,
    SessionsModule,
  ],
  providers: [SyncHubService, OntologyGateway, PresenceMonitorService],
  exports: [SyncHubService],
})
export class SyncModule {}
