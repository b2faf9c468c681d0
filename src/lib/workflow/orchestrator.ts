/**
 * Issuance orchestrator
 *
 * Drives one job through the checkpointed step sequence. Steps only raise
 * classified errors; retry, restart-with-new-order and failure are decided
 * here.
 */

import type { AcmeApi } from '../types/acme-api.js';
import type { IssuanceJob, Zone } from '../types/domain.js';
import { isUsableOrderStatus } from '../types/status.js';
import type { DnsProvider } from '../providers/dns-provider.js';
import type { HostingControlPlane } from '../providers/hosting.js';
import type { LiveDnsResolver } from '../dns/resolver.js';
import { ChallengeResolver } from '../challenges/challenge-resolver.js';
import { ChallengeVerifier, type HttpProbe } from '../challenges/challenge-verifier.js';
import { ValidationPoller, fixedIntervalRetry, type PollOptions } from '../core/validation-poller.js';
import { CertificateFinalizer } from '../core/certificate-finalizer.js';
import { Deployer } from '../core/deployer.js';
import { NoopNotifier, type CompletionNotifier } from '../notifications/webhook.js';
import {
  DeadlineExceededError,
  RestartRequiredError,
  classifyError,
  isWorkflowError,
  type FailureKind,
} from '../errors/workflow-errors.js';
import { withRetry, type RetryConfig } from '../transport/retry.js';
import { debugWorkflow } from '../utils/debug.js';
import { logWarn } from '../utils/logger.js';
import { errorMessage } from '../utils/index.js';
import type { CheckpointStore } from './checkpoint-store.js';
import { attempt, type Outcome } from './outcome.js';
import {
  WORKFLOW_STEP,
  holdsOrder,
  initialState,
  isTerminal,
  restartState,
  type WorkflowState,
  type WorkflowStep,
} from './state.js';
import { cleanupProofs, handlerFor, type StepContext } from './steps.js';

export interface OrchestratorDeps {
  acme: AcmeApi;
  dns: DnsProvider;
  hosting: HostingControlPlane;
  liveDns: LiveDnsResolver;
  probe: HttpProbe;
  checkpoints: CheckpointStore;
  notifier?: CompletionNotifier;
}

export interface OrchestratorOptions {
  /** ACME directory URL, recorded on deployed certificates */
  endpoint: string;
  /** New orders allowed after the first one fails validation (default: 2) */
  maxRestarts?: number;
  pollIntervalMs?: number;
  pollMaxAttempts?: number;
  verifyIntervalMs?: number;
  verifyMaxAttempts?: number;
  /** Retries of a step failing with a transient error (default: 3) */
  transientRetries?: number;
  /** Overall deadline per run; unset means none */
  runDeadlineMs?: number;
  preferredChain?: string;
}

export interface RunOptions {
  /** Shared zone list; fetched from the DNS provider when absent */
  zones?: () => Promise<Zone[]>;
  signal?: AbortSignal;
}

export type IssuanceStatus = 'completed' | 'failed';

export interface IssuanceResult {
  jobId: string;
  job: IssuanceJob;
  status: IssuanceStatus;
  restarts: number;
  certificate?: { thumbprint: string; expiresOn: Date; name?: string | undefined };
  failure?: { kind: FailureKind; code?: string | undefined; message: string; step: WorkflowStep };
  error?: unknown;
}

const DEFAULTS = {
  maxRestarts: 2,
  pollIntervalMs: 5_000,
  pollMaxAttempts: 60,
  verifyIntervalMs: 10_000,
  verifyMaxAttempts: 30,
  transientRetries: 3,
};

/** Steps whose persisted order is re-checked before resuming */
const ORDER_CHECK_STEPS: ReadonlySet<WorkflowStep> = new Set([
  WORKFLOW_STEP.ORDER_CREATED,
  WORKFLOW_STEP.CHALLENGES_PREPARED,
  WORKFLOW_STEP.CHALLENGES_VERIFIED_LOCALLY,
  WORKFLOW_STEP.CHALLENGES_ANSWERED_TO_CA,
  WORKFLOW_STEP.VALIDATION_POLLED,
]);

/** Memoize a zone fetch so concurrent jobs share one listing */
export function sharedZones(dns: DnsProvider): () => Promise<Zone[]> {
  let pending: Promise<Zone[]> | undefined;
  return () => {
    pending ??= dns.listZones().catch((err: unknown) => {
      pending = undefined;
      throw err;
    });
    return pending;
  };
}

export class IssuanceOrchestrator {
  private readonly opts: Required<Omit<OrchestratorOptions, 'runDeadlineMs' | 'preferredChain'>> &
    Pick<OrchestratorOptions, 'runDeadlineMs' | 'preferredChain'>;
  private readonly notifier: CompletionNotifier;

  constructor(
    private readonly deps: OrchestratorDeps,
    options: OrchestratorOptions,
  ) {
    this.opts = { ...DEFAULTS, ...options };
    this.notifier = deps.notifier ?? new NoopNotifier();
  }

  /**
   * Run every job concurrently. One job failing never affects another; the
   * zone list is fetched once for all of them.
   */
  async runBatch(jobs: readonly IssuanceJob[], runOpts: Omit<RunOptions, 'zones'> = {}): Promise<IssuanceResult[]> {
    const zones = sharedZones(this.deps.dns);
    const settled = await Promise.allSettled(jobs.map((job) => this.run(job, { ...runOpts, zones })));

    return settled.map((result, i) => {
      if (result.status === 'fulfilled') return result.value;

      // run() reports failures as results; a rejection here is a checkpoint store fault
      const job = jobs[i];
      if (job === undefined) throw result.reason;
      return this.failedResult(initialState(job), result.reason, WORKFLOW_STEP.DISCOVER);
    });
  }

  /**
   * Resume `job` from its checkpoint, or start it, and run it to completion
   * or failure.
   */
  async run(job: IssuanceJob, runOpts: RunOptions = {}): Promise<IssuanceResult> {
    const controller = new AbortController();
    const timer =
      this.opts.runDeadlineMs === undefined
        ? undefined
        : setTimeout(
            () =>
              controller.abort(
                new DeadlineExceededError(`Run deadline of ${this.opts.runDeadlineMs}ms exceeded for ${job.id}`, {
                  jobId: job.id,
                }),
              ),
            this.opts.runDeadlineMs,
          );

    const forwardAbort = () => controller.abort(runOpts.signal?.reason);
    if (runOpts.signal?.aborted) forwardAbort();
    runOpts.signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await this.drive(job, runOpts.zones ?? sharedZones(this.deps.dns), controller.signal);
    } finally {
      clearTimeout(timer);
      runOpts.signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async drive(job: IssuanceJob, zones: () => Promise<Zone[]>, signal: AbortSignal): Promise<IssuanceResult> {
    const ctx = this.createContext(zones, signal);
    let state = await this.loadOrStart(job);
    let needsOrderCheck = ORDER_CHECK_STEPS.has(state.step);

    while (!isTerminal(state.step)) {
      if (signal.aborted) {
        return this.fail(state, ctx, signal.reason);
      }

      const current = state;
      let outcome: Outcome<WorkflowState>;
      if (needsOrderCheck) {
        outcome = await attempt(() => this.withPolicy(current.step, signal, () => this.checkResumedOrder(current)));
        needsOrderCheck = false;
      } else {
        const handler = handlerFor(current.step);
        if (!handler) break;
        outcome = await attempt(() => this.withPolicy(current.step, signal, () => handler(current, ctx)));
      }

      switch (outcome.kind) {
        case 'ok':
          state = { ...outcome.value, updatedAt: new Date().toISOString() };
          debugWorkflow('%s: %s -> %s', job.id, current.step, state.step);
          if (state.step === WORKFLOW_STEP.COMPLETED) {
            await this.deps.checkpoints.remove(job.id);
          } else {
            await this.deps.checkpoints.save(state);
          }
          break;

        case 'restart':
          if (current.restarts >= this.opts.maxRestarts) {
            return this.fail(current, ctx, outcome.error);
          }
          logWarn(`${job.id}: ${errorMessage(outcome.error)}; starting a new order`);
          await cleanupProofs(current, ctx);
          state = restartState(current);
          await this.deps.checkpoints.save(state);
          break;

        case 'retriable':
        case 'precondition':
        case 'fatal':
          return this.fail(current, ctx, signal.aborted ? signal.reason : outcome.error);
      }
    }

    const certificate = state.certificate;
    return {
      jobId: job.id,
      job,
      status: 'completed',
      restarts: state.restarts,
      ...(certificate && {
        certificate: { thumbprint: certificate.thumbprint, expiresOn: new Date(certificate.expiresOn), name: certificate.name },
      }),
    };
  }

  private async loadOrStart(job: IssuanceJob): Promise<WorkflowState> {
    const saved = await this.deps.checkpoints.load(job.id);
    if (saved && !isTerminal(saved.step)) {
      debugWorkflow('%s: resuming at %s (restarts=%d)', job.id, saved.step, saved.restarts);
      return saved;
    }

    const state = initialState(job);
    await this.deps.checkpoints.save(state);
    return state;
  }

  /** A persisted order is reused only while the CA still considers it usable */
  private async checkResumedOrder(state: WorkflowState): Promise<WorkflowState> {
    if (!holdsOrder(state) || state.orderUrl === undefined) {
      throw new RestartRequiredError(`Checkpoint for ${state.job.id} at ${state.step} has no order`);
    }

    const order = await this.deps.acme.getOrder(state.orderUrl);
    if (!isUsableOrderStatus(order.status)) {
      const detail = order.error?.detail ?? order.error?.type;
      throw RestartRequiredError.invalidOrder(state.orderUrl, detail ? [detail] : []);
    }

    debugWorkflow('%s: reusing order %s (%s)', state.job.id, state.orderUrl, order.status);
    return state;
  }

  private withPolicy<T>(step: WorkflowStep, signal: AbortSignal, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, this.policyFor(step, signal), step);
  }

  private policyFor(step: WorkflowStep, signal: AbortSignal): Partial<RetryConfig> {
    switch (step) {
      case WORKFLOW_STEP.CHALLENGES_PREPARED:
        return fixedIntervalRetry({
          intervalMs: this.opts.verifyIntervalMs,
          maxAttempts: this.opts.verifyMaxAttempts,
          signal,
        });
      case WORKFLOW_STEP.CHALLENGES_ANSWERED_TO_CA:
        return fixedIntervalRetry(this.pollOptions(signal));
      default:
        return {
          maxRetries: this.opts.transientRetries,
          shouldRetry: (err) => classifyError(err) === 'retriable',
          signal,
        };
    }
  }

  private pollOptions(signal: AbortSignal): PollOptions {
    return { intervalMs: this.opts.pollIntervalMs, maxAttempts: this.opts.pollMaxAttempts, signal };
  }

  private createContext(zones: () => Promise<Zone[]>, signal: AbortSignal): StepContext {
    const { acme, dns, hosting, liveDns, probe } = this.deps;
    return {
      acme,
      dns,
      hosting,
      liveDns,
      resolver: new ChallengeResolver({ acme, hosting }),
      verifier: new ChallengeVerifier({ resolver: liveDns, probe }),
      poller: new ValidationPoller(acme),
      finalizer: new CertificateFinalizer(acme, { preferredChain: this.opts.preferredChain }),
      deployer: new Deployer(hosting, { endpoint: this.opts.endpoint }),
      notifier: this.notifier,
      zones,
      poll: this.pollOptions(signal),
      memory: {},
    };
  }

  /** Best-effort cleanup, then persist the failure */
  private async fail(state: WorkflowState, ctx: StepContext, error: unknown): Promise<IssuanceResult> {
    await cleanupProofs(state, ctx);

    const result = this.failedResult(state, error, state.step);
    logWarn(`${state.job.id} failed at ${state.step} (${result.failure?.kind}): ${errorMessage(error)}`);

    await this.deps.checkpoints.save({
      ...state,
      step: WORKFLOW_STEP.FAILED,
      error: { kind: classifyError(error), code: isWorkflowError(error) ? error.code : undefined, message: errorMessage(error) },
      updatedAt: new Date().toISOString(),
    });

    return result;
  }

  private failedResult(state: WorkflowState, error: unknown, step: WorkflowStep): IssuanceResult {
    return {
      jobId: state.job.id,
      job: state.job,
      status: 'failed',
      restarts: state.restarts,
      failure: {
        kind: classifyError(error),
        code: isWorkflowError(error) ? error.code : undefined,
        message: errorMessage(error),
        step,
      },
      error,
    };
  }
}
