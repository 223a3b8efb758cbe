import { registerAs } from '@nestjs/config';

const int = (value: string | undefined, fallback: number) => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export interface SyncConfig {
  heartbeatIntervalMs: number;
  presenceTimeoutMs: number;
  presenceSweepIntervalMs: number;
  outboxCapacity: number;
  groupMaxDepth: number;
  expandRadius: number;
  expandClearance: number;
  expandAngles: number;
}

export const syncConfig = registerAs('sync', (): SyncConfig => {
  const heartbeatIntervalMs = int(process.env.HEARTBEAT_INTERVAL_MS, 30_000);
  return {
    heartbeatIntervalMs,
    presenceTimeoutMs: int(
      process.env.PRESENCE_TIMEOUT_MS,
      heartbeatIntervalMs * 2,
    ),
    presenceSweepIntervalMs: int(process.env.PRESENCE_SWEEP_INTERVAL_MS, 10_000),
    outboxCapacity: int(process.env.OUTBOX_CAPACITY, 256),
    groupMaxDepth: int(process.env.GROUP_MAX_DEPTH, 5),
    expandRadius: int(process.env.EXPAND_RADIUS, 150),
    expandClearance: int(process.env.EXPAND_CLEARANCE, 80),
    expandAngles: int(process.env.EXPAND_ANGLES, 16),
  };
});
