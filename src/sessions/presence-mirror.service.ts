import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Redis } from 'ioredis';
import { syncConfig } from '../config/sync.config';
import { REDIS_CLIENT } from '../redis/redis.module';
import { PresenceInfo } from './session.types';

const isPresence = (value: unknown): value is Record<keyof PresenceInfo, unknown> =>
  typeof value === 'object' &&
  value !== null &&
  'connectionId' in value &&
  'userId' in value &&
  'joinedAt' in value;

/**
 * Copies presence into a Redis hash per ontology so every server instance can
 * list who is online. Without a Redis client every call is a no-op. Redis
 * failures are logged and never reach callers.
 */
@Injectable()
export class PresenceMirrorService {
  private readonly logger = new Logger(PresenceMirrorService.name);
  private readonly KEY_PREFIX = 'presence:ontology:';
  private readonly ttlSeconds: number;

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis | null,
    @Inject(syncConfig.KEY) config: ConfigType<typeof syncConfig>,
  ) {
    this.ttlSeconds = Math.ceil(config.presenceTimeoutMs / 1000);
  }

  get enabled(): boolean {
    return this.redis !== null;
  }

  async publish(ontologyId: number, presence: PresenceInfo): Promise<void> {
    if (!this.redis) return;
    const key = this.KEY_PREFIX + ontologyId;
    try {
      await this.redis
        .multi()
        .hset(key, presence.connectionId, JSON.stringify(presence))
        .expire(key, this.ttlSeconds)
        .exec();
    } catch (error) {
      this.logger.warn(`Presence publish failed for ${key}: ${String(error)}`);
    }
  }

  async remove(ontologyId: number, connectionId: string): Promise<void> {
    if (!this.redis) return;
    const key = this.KEY_PREFIX + ontologyId;
    try {
      await this.redis.hdel(key, connectionId);
    } catch (error) {
      this.logger.warn(`Presence removal failed for ${key}: ${String(error)}`);
    }
  }

  /** Cluster-wide presence, or null when the mirror is off or unreachable. */
  async list(ontologyId: number): Promise<PresenceInfo[] | null> {
    if (!this.redis) return null;
    const key = this.KEY_PREFIX + ontologyId;
    try {
      const raw = await this.redis.hgetall(key);
      return Object.values(raw)
        .flatMap((json) => {
          const value: unknown = JSON.parse(json);
          return isPresence(value) ? [this.revive(value)] : [];
        })
        .sort(
          (a, b) =>
            a.joinedAt.getTime() - b.joinedAt.getTime() ||
            a.connectionId.localeCompare(b.connectionId),
        );
    } catch (error) {
      this.logger.warn(`Presence listing failed for ${key}: ${String(error)}`);
      return null;
    }
  }

  private revive(value: Record<keyof PresenceInfo, unknown>): PresenceInfo {
    const text = (v: unknown) => (typeof v === 'string' ? v : '');
    return {
      connectionId: text(value.connectionId),
      userId: text(value.userId),
      displayName: text(value.displayName),
      email: typeof value.email === 'string' ? value.email : null,
      color: text(value.color),
      currentView: typeof value.currentView === 'string' ? value.currentView : null,
      joinedAt: new Date(text(value.joinedAt)),
      lastSeenAt: new Date(text(value.lastSeenAt)),
    };
  }
}
