import { z } from 'zod';
import type { IssuanceJob } from '../types/domain.js';

export const WORKFLOW_STEP = {
  DISCOVER: 'Discover',
  ORDER_CREATED: 'OrderCreated',
  CHALLENGES_PREPARED: 'ChallengesPrepared',
  CHALLENGES_VERIFIED_LOCALLY: 'ChallengesVerifiedLocally',
  CHALLENGES_ANSWERED_TO_CA: 'ChallengesAnsweredToCA',
  VALIDATION_POLLED: 'ValidationPolled',
  FINALIZED: 'Finalized',
  DEPLOYED: 'Deployed',
  CLEANED_UP: 'CleanedUp',
  COMPLETED: 'Completed',
  FAILED: 'Failed',
} as const;

export type WorkflowStep = (typeof WORKFLOW_STEP)[keyof typeof WORKFLOW_STEP];

const siteRefSchema = z.object({
  resourceGroup: z.string(),
  name: z.string(),
  slot: z.string().optional(),
});

const challengeResultSchema = z.object({
  challengeUrl: z.string(),
  proof: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('http-01'), url: z.string(), path: z.string(), value: z.string() }),
    z.object({ kind: z.literal('dns-01'), recordName: z.string(), value: z.string() }),
  ]),
});

export const workflowStateSchema = z.object({
  version: z.literal(1),
  job: z.object({
    id: z.string(),
    site: siteRefSchema,
    dnsNames: z.array(z.string()).min(1),
    challengeType: z.enum(['http-01', 'dns-01']),
  }),
  step: z.enum([
    WORKFLOW_STEP.DISCOVER,
    WORKFLOW_STEP.ORDER_CREATED,
    WORKFLOW_STEP.CHALLENGES_PREPARED,
    WORKFLOW_STEP.CHALLENGES_VERIFIED_LOCALLY,
    WORKFLOW_STEP.CHALLENGES_ANSWERED_TO_CA,
    WORKFLOW_STEP.VALIDATION_POLLED,
    WORKFLOW_STEP.FINALIZED,
    WORKFLOW_STEP.DEPLOYED,
    WORKFLOW_STEP.CLEANED_UP,
    WORKFLOW_STEP.COMPLETED,
    WORKFLOW_STEP.FAILED,
  ]),
  restarts: z.number().int().min(0),
  orderUrl: z.string().optional(),
  authorizations: z.array(z.string()).default([]),
  challengeResults: z.array(challengeResultSchema).default([]),
  /** Set once issued; the bundle itself is never persisted */
  certificate: z
    .object({
      thumbprint: z.string(),
      expiresOn: z.string(),
      name: z.string().optional(),
    })
    .optional(),
  error: z
    .object({
      kind: z.string(),
      code: z.string().optional(),
      message: z.string(),
    })
    .optional(),
  updatedAt: z.string(),
});

/** Serializable progress of one issuance job */
export type WorkflowState = z.infer<typeof workflowStateSchema>;

export function initialState(job: IssuanceJob, now = new Date()): WorkflowState {
  return {
    version: 1,
    job: { ...job, site: { ...job.site }, dnsNames: [...job.dnsNames] },
    step: WORKFLOW_STEP.DISCOVER,
    restarts: 0,
    authorizations: [],
    challengeResults: [],
    updatedAt: now.toISOString(),
  };
}

/** Back to Discover with the order dropped, one more restart counted */
export function restartState(state: WorkflowState, now = new Date()): WorkflowState {
  return {
    version: 1,
    job: state.job,
    step: WORKFLOW_STEP.DISCOVER,
    restarts: state.restarts + 1,
    authorizations: [],
    challengeResults: [],
    updatedAt: now.toISOString(),
  };
}

export function isTerminal(step: WorkflowStep): boolean {
  return step === WORKFLOW_STEP.COMPLETED || step === WORKFLOW_STEP.FAILED;
}

/** Steps that hold an order which can be re-fetched on resume */
export function holdsOrder(state: WorkflowState): boolean {
  return state.orderUrl !== undefined && state.step !== WORKFLOW_STEP.DISCOVER && !isTerminal(state.step);
}
