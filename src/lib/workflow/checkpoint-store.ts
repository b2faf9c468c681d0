import { createHash } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { workflowStateSchema, type WorkflowState } from './state.js';
import { errorMessage, isNotFound } from '../utils/index.js';
import { debugWorkflow } from '../utils/debug.js';
import { logWarn } from '../utils/logger.js';

/**
 * Durable per-job workflow state
 */
export interface CheckpointStore {
  load(jobId: string): Promise<WorkflowState | undefined>;
  save(state: WorkflowState): Promise<void>;
  remove(jobId: string): Promise<void>;
}

export class MemoryCheckpointStore implements CheckpointStore {
  private readonly states = new Map<string, string>();

  async load(jobId: string): Promise<WorkflowState | undefined> {
    const raw = this.states.get(jobId);
    return raw === undefined ? undefined : workflowStateSchema.parse(JSON.parse(raw));
  }

  async save(state: WorkflowState): Promise<void> {
    this.states.set(state.job.id, JSON.stringify(state));
  }

  async remove(jobId: string): Promise<void> {
    this.states.delete(jobId);
  }

  get size(): number {
    return this.states.size;
  }
}

/**
 * One JSON file per job, written to a temp file and renamed into place
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly dir: string) {}

  pathFor(jobId: string): string {
    const digest = createHash('sha1').update(jobId).digest('hex');
    return join(this.dir, `${digest}.json`);
  }

  async load(jobId: string): Promise<WorkflowState | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(jobId), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logWarn(`Ignoring unreadable checkpoint for ${jobId}: ${errorMessage(err)}`);
      return undefined;
    }

    const parsed = workflowStateSchema.safeParse(json);
    if (!parsed.success) {
      logWarn(`Ignoring unreadable checkpoint for ${jobId}: ${parsed.error.message}`);
      return undefined;
    }

    debugWorkflow('loaded checkpoint %s at %s', jobId, parsed.data.step);
    return parsed.data;
  }

  async save(state: WorkflowState): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const target = this.pathFor(state.job.id);
    const tmp = `${target}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(state, null, 2));
    await rename(tmp, target);
  }

  async remove(jobId: string): Promise<void> {
    await rm(this.pathFor(jobId), { force: true });
  }
}
