import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';

import { handleZonesCommand } from '../../src/cli/commands/zones.js';
import { loadCliConfig } from '../../src/cli/utils/config.js';
import { describeResult } from '../../src/cli/logger.js';
import type { IssuanceResult } from '../../src/lib/workflow/orchestrator.js';
import { createIssuanceJob } from '../../src/lib/workflow/job.js';
import { FakeDnsProvider, zone } from '../utils/fakes.js';

describe('CLI commands', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('loadCliConfig', () => {
    it('applies command-line overrides after the environment', async () => {
      const config = await loadCliConfig(
        { endpoint: 'buypass-staging', preferredChain: 'Example Root' },
        { SITECERT_ENDPOINT: 'letsencrypt', SITECERT_MAX_RESTARTS: '3' },
      );

      expect(config.endpoint).toBe('https://api.test4.buypass.no/acme/directory');
      expect(config.preferredChain).toBe('Example Root');
      expect(config.maxRestarts).toBe(3);
      expect(config.cloud.name).toBe('public');
    });
  });

  describe('zones', () => {
    it('reports the owning zone of every name', async () => {
      const dns = new FakeDnsProvider([zone('example.com'), zone('sub.example.com')]);

      const matches = await handleZonesCommand(
        { domain: ['*.sub.example.com', 'www.example.com', 'www.example.net'] },
        () => dns,
      );

      expect(matches).toEqual([
        { name: '*.sub.example.com', zone: 'sub.example.com' },
        { name: 'www.example.com', zone: 'example.com' },
        { name: 'www.example.net', zone: undefined },
      ]);
      expect(dns.listZonesCalls).toBe(1);
    });
  });

  describe('describeResult', () => {
    const job = createIssuanceJob({ resourceGroup: 'rg', name: 'shop' }, ['www.example.com']);

    it('summarizes an issued certificate', () => {
      const result: IssuanceResult = {
        jobId: job.id,
        job,
        status: 'completed',
        restarts: 0,
        certificate: { thumbprint: 'ABC', expiresOn: new Date('2026-06-01T00:00:00Z') },
      };

      expect(describeResult(result)).toBe('rg/shop [www.example.com]: issued ABC, expires 2026-06-01T00:00:00.000Z');
    });

    it('summarizes a failure with its step', () => {
      const result: IssuanceResult = {
        jobId: job.id,
        job,
        status: 'failed',
        restarts: 1,
        failure: { kind: 'precondition', message: 'Site rg/shop not found', step: 'Discover' },
      };

      expect(describeResult(result)).toBe('rg/shop [www.example.com]: precondition failure at Discover: Site rg/shop not found');
    });
  });
});
