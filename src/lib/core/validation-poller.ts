import type { AcmeApi } from '../types/acme-api.js';
import type { AcmeOrder } from '../types/order.js';
import type { ChallengeResult } from '../types/domain.js';
import { CHALLENGE_STATUS, ORDER_STATUS } from '../types/status.js';
import {
  RestartRequiredError,
  RetriableActivityError,
  classifyError,
} from '../errors/workflow-errors.js';
import type { RetryConfig } from '../transport/retry.js';
import { debugWorkflow } from '../utils/debug.js';

export interface PollOptions {
  /** Fixed delay between polls */
  intervalMs: number;
  maxAttempts: number;
  signal?: AbortSignal | undefined;
}

/** Retry policy for polling: fixed delay, retriable failures only */
export function fixedIntervalRetry(opts: PollOptions): Partial<RetryConfig> {
  return {
    maxRetries: Math.max(0, opts.maxAttempts - 1),
    baseDelayMs: opts.intervalMs,
    maxDelayMs: opts.intervalMs,
    backoffFactor: 1,
    jitterPercent: 0,
    respectRetryAfter: false,
    shouldRetry: (err) => classifyError(err) === 'retriable',
    signal: opts.signal,
  };
}

/**
 * Order status checks after the challenges were answered
 */
export class ValidationPoller {
  constructor(private readonly acme: AcmeApi) {}

  /**
   * `pending`/`processing` throw RetriableActivityError; `invalid` throws
   * RestartRequiredError with the error detail of every invalid challenge;
   * `ready`/`valid` return the order.
   */
  async checkOrderStatus(orderUrl: string, challengeResults: readonly ChallengeResult[]): Promise<AcmeOrder> {
    const order = await this.acme.getOrder(orderUrl);
    debugWorkflow('order %s status=%s', orderUrl, order.status);

    switch (order.status) {
      case ORDER_STATUS.PENDING:
      case ORDER_STATUS.PROCESSING:
        throw RetriableActivityError.orderPending(orderUrl, order.status);
      case ORDER_STATUS.INVALID:
        throw RestartRequiredError.invalidOrder(orderUrl, await this.collectProblems(order, challengeResults));
      case ORDER_STATUS.READY:
      case ORDER_STATUS.VALID:
        return order;
    }
  }

  private async collectProblems(order: AcmeOrder, challengeResults: readonly ChallengeResult[]): Promise<string[]> {
    const problems: string[] = [];

    for (const result of challengeResults) {
      const challenge = await this.acme.getChallenge(result.challengeUrl);
      if (challenge.status !== CHALLENGE_STATUS.INVALID) continue;

      const detail = challenge.error?.detail ?? challenge.error?.type ?? 'no error detail';
      problems.push(`${result.challengeUrl}: ${detail}`);
    }

    if (problems.length === 0 && order.error) {
      problems.push(order.error.detail ?? order.error.type ?? 'order invalid');
    }

    return problems;
  }
}
