/**
 * Component: Controller Factory Tests
 * Documentation: documentation/configuration.md
 */

import { describe, expect, it, vi } from 'vitest';
import type { QueueManagerKind } from '@/lib/interfaces/queue-manager.interface';
import { CleanupController } from '@/lib/processors/cleanup.processor';
import { RetryController } from '@/lib/processors/retry.processor';
import { parseConfig, type GroupConfigInput } from '@/lib/services/config.service';
import { createGroupControllers } from '@/lib/services/controller-factory.service';
import { ConfigurationError } from '@/lib/utils/errors';
import { createFakeQueueManager, createFakeTorrentClient } from '../helpers/fixtures';

const base: GroupConfigInput = {
  qbittorrent: { host: 'http://qbittorrent:8080', username: 'admin', password: 'test-secret' },
};

function build(input: Partial<GroupConfigInput>) {
  const [group] = parseConfig({ ...base, ...input }).groups;
  const createQueueManager = vi.fn((kind: QueueManagerKind) => createFakeQueueManager(kind));
  const controllers = createGroupControllers(group, 0, {
    createTorrentClient: () => createFakeTorrentClient(),
    createQueueManager,
  });
  return { controllers, createQueueManager };
}

describe('createGroupControllers', () => {
  it('builds nothing without cleanup or retry sections', () => {
    const { controllers } = build({});

    expect(controllers).toEqual({ label: 'group 1', cleanup: null, retry: null });
  });

  it('builds both controllers for a complete group', () => {
    const { controllers, createQueueManager } = build({
      name: 'media',
      sonarr: { host: 'http://sonarr:8989', apiKey: 'test-key' },
      radarr: { host: 'http://radarr:7878', apiKey: 'test-key' },
      cleanup: { ratio: '<1' },
      retry: {},
    });

    expect(controllers.label).toBe('media');
    expect(controllers.cleanup).toBeInstanceOf(CleanupController);
    expect(controllers.retry).toBeInstanceOf(RetryController);
    expect(createQueueManager).toHaveBeenCalledTimes(2);
  });

  it('leaves cleanup out when the ratio expression is invalid', () => {
    const { controllers } = build({ cleanup: { ratio: '=1' }, retry: {}, sonarr: { host: 'http://sonarr:8989', apiKey: 'test-key' } });

    expect(controllers.cleanup).toBeNull();
    expect(controllers.retry).toBeInstanceOf(RetryController);
  });

  it('leaves retry out without a manager', () => {
    const { controllers } = build({ retry: {} });

    expect(controllers.retry).toBeNull();
  });

  it('leaves retry out when the stalled interval is out of range', () => {
    const { controllers } = build({
      radarr: { host: 'http://radarr:7878', apiKey: 'test-key' },
      retry: { stalledInterval: 30 },
    });

    expect(controllers.retry).toBeNull();
  });

  it('fails when a client cannot be created', () => {
    const [group] = parseConfig(base).groups;

    expect(() =>
      createGroupControllers(group, 0, {
        createTorrentClient: () => {
          throw new ConfigurationError('Invalid service URL');
        },
      })
    ).toThrow('Invalid service URL');
  });

  describe('with a manager endpoint that is not http(s)', () => {
    function buildWithRealManagers(input: Partial<GroupConfigInput>) {
      const [group] = parseConfig({ ...base, ...input }).groups;
      return createGroupControllers(group, 0, { createTorrentClient: () => createFakeTorrentClient() });
    }

    it('disables cleanup and keeps retry for the remaining manager', () => {
      const controllers = buildWithRealManagers({
        sonarr: { host: 'ftp://sonarr:8989', apiKey: 'test-key' },
        radarr: { host: 'http://radarr:7878', apiKey: 'test-key' },
        cleanup: { ratio: '<1' },
        retry: {},
      });

      expect(controllers.cleanup).toBeNull();
      expect(controllers.retry).toBeInstanceOf(RetryController);
      if (controllers.retry instanceof RetryController) {
        expect(controllers.retry.getLedger('radarr')).toBeDefined();
        expect(controllers.retry.getLedger('sonarr')).toBeUndefined();
      }
    });

    it('disables retry when no usable manager remains', () => {
      const controllers = buildWithRealManagers({
        sonarr: { host: 'ftp://sonarr:8989', apiKey: 'test-key' },
        retry: {},
      });

      expect(controllers).toEqual({ label: 'group 1', cleanup: null, retry: null });
    });
  });
});
