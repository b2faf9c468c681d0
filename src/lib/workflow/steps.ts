/**
 * One handler per non-terminal workflow step. Each performs the side effects
 * needed to leave its step and returns the next state; the orchestrator
 * persists it.
 */

import type { AcmeApi } from '../types/acme-api.js';
import type { DnsProof, HttpProof, IssuedCertificate, Zone } from '../types/domain.js';
import { CHALLENGE_STATUS, CHALLENGE_TYPE } from '../types/status.js';
import type { DnsProvider } from '../providers/dns-provider.js';
import type { HostingControlPlane } from '../providers/hosting.js';
import { isSuccess } from '../providers/hosting.js';
import type { LiveDnsResolver } from '../dns/resolver.js';
import { matchZones, verifyDelegation } from '../dns/zone-matcher.js';
import { deleteChallengeRecords, upsertChallengeRecords } from '../dns/txt-records.js';
import type { ChallengeResolver } from '../challenges/challenge-resolver.js';
import type { ChallengeVerifier } from '../challenges/challenge-verifier.js';
import type { ValidationPoller, PollOptions } from '../core/validation-poller.js';
import type { CertificateFinalizer } from '../core/certificate-finalizer.js';
import type { Deployer } from '../core/deployer.js';
import { notifyCompleted, type CompletionNotifier } from '../notifications/webhook.js';
import { RestartRequiredError, SiteNotFoundError } from '../errors/workflow-errors.js';
import { siteKey } from '../types/domain.js';
import { debugWorkflow } from '../utils/debug.js';
import { logWarn } from '../utils/logger.js';
import { errorMessage } from '../utils/index.js';
import { WORKFLOW_STEP, type WorkflowState, type WorkflowStep } from './state.js';

export interface StepContext {
  acme: AcmeApi;
  dns: DnsProvider;
  hosting: HostingControlPlane;
  liveDns: LiveDnsResolver;
  resolver: ChallengeResolver;
  verifier: ChallengeVerifier;
  poller: ValidationPoller;
  finalizer: CertificateFinalizer;
  deployer: Deployer;
  notifier: CompletionNotifier;
  /** Zone list, fetched at most once per run */
  zones: () => Promise<Zone[]>;
  /** Finalize-time polling */
  poll: PollOptions;
  /** Lives only for this process; lost on resume */
  memory: { certificate?: IssuedCertificate | undefined };
}

export type StepHandler = (state: WorkflowState, ctx: StepContext) => Promise<WorkflowState>;

function requireOrderUrl(state: WorkflowState): string {
  if (!state.orderUrl) {
    throw new RestartRequiredError(`No order recorded at step ${state.step}`);
  }
  return state.orderUrl;
}

function dnsProofs(state: WorkflowState): DnsProof[] {
  return state.challengeResults.flatMap((r) => (r.proof.kind === 'dns-01' ? [r.proof] : []));
}

function httpProofs(state: WorkflowState): HttpProof[] {
  return state.challengeResults.flatMap((r) => (r.proof.kind === 'http-01' ? [r.proof] : []));
}

/** Preconditions, then a new order */
export const discover: StepHandler = async (state, ctx) => {
  const { job } = state;

  if (job.challengeType === CHALLENGE_TYPE.DNS_01) {
    const zones = await ctx.zones();
    const matched = matchZones(
      job.dnsNames.map((n) => n.replace(/^\*\./, '')),
      zones,
    );
    await verifyDelegation(matched.values(), ctx.liveDns);
  } else if (!(await ctx.hosting.getSite(job.site))) {
    throw new SiteNotFoundError(siteKey(job.site));
  }

  const order = await ctx.acme.createOrder(job.dnsNames);
  return {
    ...state,
    step: WORKFLOW_STEP.ORDER_CREATED,
    orderUrl: order.url,
    authorizations: order.authorizations,
    challengeResults: [],
  };
};

/** Derive proofs; publish HTTP files or upsert TXT record sets */
export const prepareChallenges: StepHandler = async (state, ctx) => {
  const results = await ctx.resolver.resolve(state.authorizations, state.job.challengeType);
  const next = { ...state, step: WORKFLOW_STEP.CHALLENGES_PREPARED, challengeResults: results };

  try {
    const http = httpProofs(next);
    if (http.length > 0) {
      await ctx.resolver.publishHttpProofs(state.job.site, http);
    }
    const dns = dnsProofs(next);
    if (dns.length > 0) {
      await upsertChallengeRecords(ctx.dns, dns, await ctx.zones());
    }
  } catch (err) {
    // a failed run keeps no proofs in its state; remove what was published
    await cleanupProofs(next, ctx);
    throw err;
  }

  return next;
};

export const verifyLocally: StepHandler = async (state, ctx) => {
  await ctx.verifier.verifyAll(state.challengeResults.map((r) => r.proof));
  return { ...state, step: WORKFLOW_STEP.CHALLENGES_VERIFIED_LOCALLY };
};

/** Tell the CA about every challenge it has not started on */
export const answerChallenges: StepHandler = async (state, ctx) => {
  for (const result of state.challengeResults) {
    const challenge = await ctx.acme.getChallenge(result.challengeUrl);
    if (challenge.status !== CHALLENGE_STATUS.PENDING) {
      debugWorkflow('challenge %s is %s, not answering again', result.challengeUrl, challenge.status);
      continue;
    }
    await ctx.acme.answerChallenge(result.challengeUrl);
  }
  return { ...state, step: WORKFLOW_STEP.CHALLENGES_ANSWERED_TO_CA };
};

export const pollValidation: StepHandler = async (state, ctx) => {
  await ctx.poller.checkOrderStatus(requireOrderUrl(state), state.challengeResults);
  return { ...state, step: WORKFLOW_STEP.VALIDATION_POLLED };
};

export const finalizeOrder: StepHandler = async (state, ctx) => {
  const order = await ctx.acme.getOrder(requireOrderUrl(state));
  const certificate = await ctx.finalizer.finalize(order, state.job.dnsNames, ctx.poll);
  ctx.memory.certificate = certificate;

  return {
    ...state,
    step: WORKFLOW_STEP.FINALIZED,
    certificate: { thumbprint: certificate.thumbprint, expiresOn: certificate.expiresOn.toISOString() },
  };
};

/** Import, bind, then drop superseded certificates */
export const deploy: StepHandler = async (state, ctx) => {
  const certificate = ctx.memory.certificate;
  if (!certificate) {
    throw RestartRequiredError.keyLost(requireOrderUrl(state));
  }

  const site = await ctx.hosting.getSite(state.job.site);
  if (!site) {
    throw new SiteNotFoundError(siteKey(state.job.site));
  }

  const upload = await ctx.deployer.upload(site, certificate);
  await ctx.deployer.bind(site, state.job.dnsNames, certificate.thumbprint);
  await ctx.deployer.removeStaleCertificates(site, state.job.dnsNames, certificate.thumbprint);

  return {
    ...state,
    step: WORKFLOW_STEP.DEPLOYED,
    certificate: {
      thumbprint: certificate.thumbprint,
      expiresOn: certificate.expiresOn.toISOString(),
      name: upload.name,
    },
  };
};

export const cleanup: StepHandler = async (state, ctx) => {
  await cleanupProofs(state, ctx);
  return { ...state, step: WORKFLOW_STEP.CLEANED_UP };
};

export const complete: StepHandler = async (state, ctx) => {
  if (state.certificate) {
    await notifyCompleted(ctx.notifier, {
      site: state.job.site,
      expiresOn: new Date(state.certificate.expiresOn),
      dnsNames: state.job.dnsNames,
    });
  }
  ctx.memory.certificate = undefined;
  return { ...state, step: WORKFLOW_STEP.COMPLETED };
};

/**
 * Remove DNS records and HTTP files of the current proofs. Never throws.
 */
export async function cleanupProofs(state: WorkflowState, ctx: StepContext): Promise<void> {
  const dns = dnsProofs(state);
  if (dns.length > 0) {
    try {
      await deleteChallengeRecords(ctx.dns, dns, await ctx.zones());
    } catch (err) {
      logWarn(`DNS challenge cleanup for ${state.job.id} failed: ${errorMessage(err)}`);
    }
  }

  for (const proof of httpProofs(state)) {
    try {
      const result = await ctx.hosting.deleteFile(state.job.site, proof.path);
      if (!isSuccess(result) && result.statusCode !== 404) {
        logWarn(`Could not remove ${result.target}: status ${result.statusCode}`);
      }
    } catch (err) {
      logWarn(`HTTP challenge cleanup for ${state.job.id} failed: ${errorMessage(err)}`);
    }
  }
}

const STEP_HANDLERS: Partial<Record<WorkflowStep, StepHandler>> = {
  [WORKFLOW_STEP.DISCOVER]: discover,
  [WORKFLOW_STEP.ORDER_CREATED]: prepareChallenges,
  [WORKFLOW_STEP.CHALLENGES_PREPARED]: verifyLocally,
  [WORKFLOW_STEP.CHALLENGES_VERIFIED_LOCALLY]: answerChallenges,
  [WORKFLOW_STEP.CHALLENGES_ANSWERED_TO_CA]: pollValidation,
  [WORKFLOW_STEP.VALIDATION_POLLED]: finalizeOrder,
  [WORKFLOW_STEP.FINALIZED]: deploy,
  [WORKFLOW_STEP.DEPLOYED]: cleanup,
  [WORKFLOW_STEP.CLEANED_UP]: complete,
};

/** Handler leaving `step`; none for Completed and Failed */
export function handlerFor(step: WorkflowStep): StepHandler | undefined {
  return STEP_HANDLERS[step];
}
