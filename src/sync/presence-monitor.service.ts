import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { syncConfig } from '../config/sync.config';
import { SyncHubService } from './sync-hub.service';

/**
 * Periodically evicts presence entries that stopped sending heartbeats, then
 * unloads graphs left without subscribers.
 */
@Injectable()
export class PresenceMonitorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PresenceMonitorService.name);
  private timer: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(
    private readonly hub: SyncHubService,
    @Inject(syncConfig.KEY)
    private readonly config: ConfigType<typeof syncConfig>,
  ) {}

  onModuleInit(): void {
    this.timer = setInterval(() => void this.sweep(), this.config.presenceSweepIntervalMs);
    this.timer.unref();
  }

  onModuleDestroy(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  async sweep(): Promise<number> {
    if (this.sweeping) return 0;
    this.sweeping = true;
    try {
      const evicted = await this.hub.evictStale();
      if (evicted.length > 0) {
        this.logger.log(`🧹 Evicted ${evicted.length} stale session(s)`);
      }
      await this.hub.releaseIdleOntologies();
      return evicted.length;
    } catch (error) {
      this.logger.error(
        'Presence sweep failed',
        error instanceof Error ? error.stack : String(error),
      );
      return 0;
    } finally {
      this.sweeping = false;
    }
  }
}
