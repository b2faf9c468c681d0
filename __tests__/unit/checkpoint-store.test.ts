import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';

import { FileCheckpointStore, MemoryCheckpointStore } from '../../src/lib/workflow/checkpoint-store.js';
import { WORKFLOW_STEP, holdsOrder, initialState, isTerminal, restartState } from '../../src/lib/workflow/state.js';
import { createIssuanceJob } from '../../src/lib/workflow/job.js';
import { setLogger } from '../../src/lib/utils/logger.js';

const NOW = new Date('2026-03-01T00:00:00Z');
const job = createIssuanceJob({ resourceGroup: 'rg', name: 'shop' }, ['www.example.com']);

describe('workflow state', () => {
  it('starts at Discover', () => {
    expect(initialState(job, NOW)).toEqual({
      version: 1,
      job,
      step: 'Discover',
      restarts: 0,
      authorizations: [],
      challengeResults: [],
      updatedAt: '2026-03-01T00:00:00.000Z',
    });
  });

  it('drops the order on restart', () => {
    const state = {
      ...initialState(job, NOW),
      step: WORKFLOW_STEP.VALIDATION_POLLED,
      orderUrl: 'https://ca.test/acme/order/1',
      authorizations: ['https://ca.test/acme/authz/1-0'],
    };
    expect(holdsOrder(state)).toBe(true);

    const restarted = restartState(state, NOW);
    expect(restarted).toMatchObject({ step: 'Discover', restarts: 1, authorizations: [] });
    expect(restarted.orderUrl).toBeUndefined();
    expect(holdsOrder(restarted)).toBe(false);
  });

  it('knows the terminal steps', () => {
    expect(isTerminal('Completed')).toBe(true);
    expect(isTerminal('Failed')).toBe(true);
    expect(isTerminal('CleanedUp')).toBe(false);
  });
});

describe('MemoryCheckpointStore', () => {
  it('returns a copy of what was saved', async () => {
    const store = new MemoryCheckpointStore();
    const state = initialState(job, NOW);
    await store.save(state);
    state.restarts = 5;

    await expect(store.load(job.id)).resolves.toMatchObject({ restarts: 0 });
    await store.remove(job.id);
    expect(store.size).toBe(0);
  });
});

describe('FileCheckpointStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sitecert-checkpoint-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('round-trips a state through one file per job', async () => {
    const store = new FileCheckpointStore(join(dir, 'nested'));
    const state = { ...initialState(job, NOW), step: WORKFLOW_STEP.ORDER_CREATED, orderUrl: 'https://ca.test/acme/order/1' };

    await store.save(state);

    await expect(store.load(job.id)).resolves.toEqual(state);
    expect(await readdir(join(dir, 'nested'))).toEqual([basename(store.pathFor(job.id))]);
  });

  it('treats a missing file as no checkpoint', async () => {
    await expect(new FileCheckpointStore(dir).load(job.id)).resolves.toBeUndefined();
  });

  it('ignores a checkpoint it cannot read', async () => {
    const store = new FileCheckpointStore(dir);
    await writeFile(store.pathFor(job.id), JSON.stringify({ version: 2 }));

    await expect(store.load(job.id)).resolves.toBeUndefined();
  });

  it('warns about a truncated checkpoint and starts without it', async () => {
    const warnings: string[] = [];
    setLogger((message) => warnings.push(message));
    try {
      const store = new FileCheckpointStore(dir);
      await store.save(initialState(job, NOW));
      const saved = await readFile(store.pathFor(job.id), 'utf-8');
      await writeFile(store.pathFor(job.id), saved.slice(0, 20));

      await expect(store.load(job.id)).resolves.toBeUndefined();
    } finally {
      setLogger(undefined);
    }

    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.startsWith(`WARN: Ignoring unreadable checkpoint for ${job.id}: `)).toBe(true);
  });

  it('removes a checkpoint, missing or not', async () => {
    const store = new FileCheckpointStore(dir);
    await store.save(initialState(job, NOW));

    await store.remove(job.id);
    await store.remove(job.id);

    await expect(store.load(job.id)).resolves.toBeUndefined();
  });
});
