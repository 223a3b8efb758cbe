import { Module } from '@nestjs/common';
import { PermissionGateService } from './permission-gate.service';

// Repositories come from the global DatabaseModule
@Module({
  providers: [PermissionGateService],
  exports: [PermissionGateService],
})
export class PermissionsModule {}
