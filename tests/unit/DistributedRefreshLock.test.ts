/**
 * DistributedRefreshLock unit tests: local-only mode, lock acquisition and
 * release against a mocked Redis client, and degradation on Redis failures.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DistributedRefreshLock } from '../../src/core/token/DistributedRefreshLock';
import type { Logger } from '../../src/observability/Logger';
import { createTestLogger } from '../helpers';

const mockRedisClient = vi.hoisted(() => ({
  connect: vi.fn(),
  quit: vi.fn(),
  set: vi.fn(),
  exists: vi.fn(),
  eval: vi.fn(),
  on: vi.fn(),
}));

vi.mock('redis', () => ({
  createClient: vi.fn(() => mockRedisClient),
}));

describe('DistributedRefreshLock', () => {
  let logger: Logger;
  let lock: DistributedRefreshLock | undefined;

  beforeEach(() => {
    vi.clearAllMocks();
    logger = createTestLogger();
    mockRedisClient.connect.mockResolvedValue(undefined);
    mockRedisClient.quit.mockResolvedValue('OK');
  });

  afterEach(async () => {
    await lock?.disconnect();
    lock = undefined;
  });

  describe('local-only mode', () => {
    it('should run without a Redis URL', async () => {
      lock = new DistributedRefreshLock(undefined, logger);
      await lock.initialize();

      expect(lock.getConnectionStatus()).toEqual({
        connected: false,
        mode: 'local-only',
        healthy: true,
      });
    });

    it('should always acquire and never touch Redis', async () => {
      lock = new DistributedRefreshLock(undefined, logger);
      await lock.initialize();

      await expect(lock.tryAcquire('hubspot', 'user1')).resolves.toBe(true);
      await lock.waitForRelease('hubspot', 'user1');
      await lock.release('hubspot', 'user1');

      expect(mockRedisClient.set).not.toHaveBeenCalled();
      expect(mockRedisClient.exists).not.toHaveBeenCalled();
      expect(mockRedisClient.eval).not.toHaveBeenCalled();
    });

    it('should fall back to local-only when Redis cannot connect', async () => {
      const warn = vi.spyOn(logger, 'warn');
      mockRedisClient.connect.mockRejectedValue(new Error('ECONNREFUSED'));

      lock = new DistributedRefreshLock('redis://localhost:6379', logger);
      await lock.initialize();

      expect(lock.getConnectionStatus().mode).toBe('local-only');
      expect(warn).toHaveBeenCalledWith(
        'Distributed refresh lock unavailable, running in local-only mode',
        { error: 'ECONNREFUSED' }
      );
      await expect(lock.tryAcquire('hubspot', 'user1')).resolves.toBe(true);
    });
  });

  describe('distributed mode', () => {
    beforeEach(async () => {
      lock = new DistributedRefreshLock('redis://localhost:6379', logger, 8000);
      await lock.initialize();
    });

    it('should report a healthy connection', () => {
      expect(lock?.getConnectionStatus()).toEqual({
        connected: true,
        mode: 'distributed',
        healthy: true,
      });
    });

    it('should acquire with SET NX PX on a per-credential key', async () => {
      mockRedisClient.set.mockResolvedValue('OK');

      await expect(lock?.tryAcquire('notion', 'user7')).resolves.toBe(true);
      expect(mockRedisClient.set).toHaveBeenCalledWith('refresh_lock:notion:user7', expect.any(String), {
        PX: 8000,
        NX: true,
      });
    });

    it('should report a lock held by another instance', async () => {
      mockRedisClient.set.mockResolvedValue(null);

      await expect(lock?.tryAcquire('notion', 'user7')).resolves.toBe(false);
    });

    it('should acquire when Redis errors', async () => {
      mockRedisClient.set.mockRejectedValue(new Error('READONLY'));

      await expect(lock?.tryAcquire('hubspot', 'user1')).resolves.toBe(true);
    });

    it('should release only with the token it acquired', async () => {
      mockRedisClient.set.mockResolvedValue('OK');
      mockRedisClient.eval.mockResolvedValue(1);

      await lock?.tryAcquire('airtable', 'user2');
      await lock?.release('airtable', 'user2');

      const token = mockRedisClient.set.mock.calls[0][1];
      expect(mockRedisClient.eval).toHaveBeenCalledWith(expect.stringContaining("redis.call('del'"), {
        keys: ['refresh_lock:airtable:user2'],
        arguments: [token],
      });
    });

    it('should not release a lock it never held', async () => {
      await lock?.release('airtable', 'user2');

      expect(mockRedisClient.eval).not.toHaveBeenCalled();
    });

    it('should wait until the lock key disappears', async () => {
      mockRedisClient.exists.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

      await lock?.waitForRelease('hubspot', 'user1', 2000);

      expect(mockRedisClient.exists).toHaveBeenCalledTimes(2);
      expect(mockRedisClient.exists).toHaveBeenCalledWith('refresh_lock:hubspot:user1');
    });

    it('should stop waiting at the timeout', async () => {
      const warn = vi.spyOn(logger, 'warn');
      mockRedisClient.exists.mockResolvedValue(1);

      await lock?.waitForRelease('hubspot', 'user1', 150);

      expect(warn).toHaveBeenCalledWith('Timed out waiting for refresh lock release', {
        provider: 'hubspot',
        ownerContext: 'user1',
        timeoutMs: 150,
      });
    });

    it('should quit on disconnect', async () => {
      await lock?.disconnect();

      expect(mockRedisClient.quit).toHaveBeenCalledTimes(1);
      expect(lock?.getConnectionStatus().connected).toBe(false);
    });
  });
});
