import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { syncConfig } from '../config/sync.config';
import { PresenceMirrorService } from './presence-mirror.service';
import { SessionRegistryService } from './session-registry.service';

@Module({
  imports: [ConfigModule.forFeature(syncConfig)],
  providers: [SessionRegistryService, PresenceMirrorService],
  exports: [SessionRegistryService, PresenceMirrorService],
})
export class SessionsModule {}
