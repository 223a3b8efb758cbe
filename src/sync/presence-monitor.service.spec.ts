import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { syncConfig } from '../config/sync.config';
import { PresenceMonitorService } from './presence-monitor.service';
import { SyncHubService } from './sync-hub.service';

describe('PresenceMonitorService', () => {
  let monitor: PresenceMonitorService;
  const evictStale = jest.fn();
  const releaseIdleOntologies = jest.fn();

  beforeEach(async () => {
    evictStale.mockReset();
    releaseIdleOntologies.mockReset().mockResolvedValue([]);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    const moduleRef = await Test.createTestingModule({
      providers: [
        PresenceMonitorService,
        { provide: SyncHubService, useValue: { evictStale, releaseIdleOntologies } },
        { provide: syncConfig.KEY, useValue: { presenceSweepIntervalMs: 1000 } },
      ],
    }).compile();
    monitor = moduleRef.get(PresenceMonitorService);
  });

  afterEach(() => jest.restoreAllMocks());

  it('returns how many sessions a sweep evicted', async () => {
    evictStale.mockResolvedValue([{ connectionId: 'a' }, { connectionId: 'b' }]);

    expect(await monitor.sweep()).toBe(2);
  });

  it('unloads idle graphs after evicting sessions', async () => {
    evictStale.mockResolvedValue([]);

    await monitor.sweep();

    expect(releaseIdleOntologies).toHaveBeenCalledTimes(1);
  });

  it('logs a failed sweep and keeps going', async () => {
    const error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    evictStale.mockRejectedValueOnce(new Error('registry offline')).mockResolvedValueOnce([]);

    expect(await monitor.sweep()).toBe(0);
    expect(error).toHaveBeenCalledWith('Presence sweep failed', expect.stringContaining('registry offline'));
    expect(await monitor.sweep()).toBe(0);
    expect(evictStale).toHaveBeenCalledTimes(2);
  });

  it('skips a sweep while the previous one is still running', async () => {
    let finish: (value: unknown[]) => void = () => undefined;
    evictStale.mockReturnValueOnce(
      new Promise<unknown[]>((resolve) => {
        finish = resolve;
      }),
    );

    const first = monitor.sweep();
    expect(await monitor.sweep()).toBe(0);
    finish([]);

    expect(await first).toBe(0);
    expect(evictStale).toHaveBeenCalledTimes(1);
  });
});
