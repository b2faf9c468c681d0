/**
 * Workflow errors
 *
 * Each error carries the outcome kind it maps to. Steps raise these where the
 * condition is detected; the orchestrator alone decides whether to retry,
 * restart with a new order or give up.
 */

import { AcmeError, BadNonceError, RateLimitedError } from './acme-errors.js';
import { isRetryableError } from '../transport/retry.js';

export type FailureKind = 'retriable' | 'precondition' | 'restart' | 'fatal';

/** Throttling and server errors */
export function isTransientStatus(statusCode: number): boolean {
  return statusCode === 429 || statusCode >= 500;
}

export abstract class WorkflowError extends Error {
  abstract readonly code: string;
  abstract readonly kind: FailureKind;
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, kind: this.kind, message: this.message, context: this.context };
  }
}

/** One or more names have no owning zone in the DNS provider */
export class ZoneNotFoundError extends WorkflowError {
  override readonly code = 'ZONE_NOT_FOUND';
  override readonly kind = 'precondition';

  constructor(readonly names: string[]) {
    super(`DNS zone(s) not found for: ${names.join(', ')}`, { names });
  }

  static forNames(names: Iterable<string>): ZoneNotFoundError {
    return new ZoneNotFoundError([...names]);
  }
}

export class NameServerMismatchError extends WorkflowError {
  override readonly code = 'NAME_SERVER_MISMATCH';
  override readonly kind = 'precondition';

  constructor(
    readonly zone: string,
    readonly expected: string[],
    readonly actual: string[],
  ) {
    super(
      `Name servers for zone ${zone} do not match. Expected: ${expected.join(', ')}. Actual: ${
        actual.length > 0 ? actual.join(', ') : '(none)'
      }`,
      { zone, expected, actual },
    );
  }
}

export class ChallengeTypeConflictError extends WorkflowError {
  override readonly code = 'CHALLENGE_TYPE_CONFLICT';
  override readonly kind = 'precondition';

  constructor(
    readonly identifier: string,
    readonly challengeType: string,
    readonly offered: string[],
  ) {
    super(
      `${challengeType} challenge not offered for ${identifier} (offered: ${
        offered.length > 0 ? offered.join(', ') : 'none'
      })`,
      { identifier, challengeType, offered },
    );
  }
}

export class SiteNotFoundError extends WorkflowError {
  override readonly code = 'SITE_NOT_FOUND';
  override readonly kind = 'precondition';

  constructor(readonly site: string) {
    super(`Site ${site} not found`, { site });
  }
}

/** A proof is not observable yet */
export class RetriableValidationError extends WorkflowError {
  override readonly code = 'VALIDATION_NOT_OBSERVABLE';
  override readonly kind = 'retriable';

  static httpMismatch(url: string, expected: string, actual: string, statusCode: number): RetriableValidationError {
    return new RetriableValidationError(
      `${url} returned status ${statusCode}. Expected: "${expected}". Actual: "${actual}"`,
      { url, expected, actual, statusCode },
    );
  }

  static dnsNotResolved(recordName: string): RetriableValidationError {
    return new RetriableValidationError(`${recordName} did not resolve`, { recordName });
  }

  static dnsMismatch(recordName: string, expected: string, actual: string[]): RetriableValidationError {
    return new RetriableValidationError(
      `${recordName} value is not correct. Expected: "${expected}". Actual: ${
        actual.length > 0 ? actual.map((v) => `"${v}"`).join(', ') : '(none)'
      }`,
      { recordName, expected, actual },
    );
  }

  static transport(target: string, cause: unknown): RetriableValidationError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new RetriableValidationError(`${target} could not be checked: ${reason}`, { target }, cause);
  }
}

/** The CA has not reached a terminal order state yet */
export class RetriableActivityError extends WorkflowError {
  override readonly code = 'ACTIVITY_PENDING';
  override readonly kind = 'retriable';

  static orderPending(orderUrl: string, status: string): RetriableActivityError {
    return new RetriableActivityError(`ACME order ${orderUrl} is ${status}`, { orderUrl, status });
  }
}

export class RestartRequiredError extends WorkflowError {
  override readonly code = 'RESTART_REQUIRED';
  override readonly kind = 'restart';

  constructor(
    message: string,
    readonly problems: string[] = [],
    context: Record<string, unknown> = {},
  ) {
    super(message, { ...context, problems });
  }

  static invalidOrder(orderUrl: string, problems: string[]): RestartRequiredError {
    const detail = problems.length > 0 ? `: ${problems.join('; ')}` : '';
    return new RestartRequiredError(`ACME order ${orderUrl} is invalid${detail}`, problems, { orderUrl });
  }

  /** The certificate key lived only in the previous process */
  static keyLost(orderUrl: string): RestartRequiredError {
    return new RestartRequiredError(
      `Private key for order ${orderUrl} is no longer available; a new order is required`,
      [],
      { orderUrl },
    );
  }
}

export class FinalizeError extends WorkflowError {
  override readonly code = 'FINALIZE_FAILED';
  override readonly kind: FailureKind;

  constructor(message: string, retriable: boolean, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, context, cause);
    this.kind = retriable ? 'retriable' : 'fatal';
  }

  static stillProcessing(orderUrl: string): FinalizeError {
    return new FinalizeError(`ACME order ${orderUrl} is still processing`, true, { orderUrl, status: 'processing' });
  }

  static unexpectedStatus(orderUrl: string, status: string): FinalizeError {
    return new FinalizeError(`ACME order ${orderUrl} finished finalization as ${status}`, false, {
      orderUrl,
      status,
    });
  }
}

/** A control-plane write failed; throttling and server errors are retriable */
export class DeploymentError extends WorkflowError {
  override readonly code = 'DEPLOYMENT_FAILED';
  override readonly kind: FailureKind;

  constructor(
    readonly operation: string,
    readonly target: string,
    readonly statusCode: number,
    readonly payloadSize: number,
    detail?: string,
  ) {
    super(
      `${operation} failed with status ${statusCode}. Target: ${target}. Payload size: ${payloadSize} bytes${
        detail ? `. ${detail}` : ''
      }`,
      { operation, target, statusCode, payloadSize },
    );
    this.kind = isTransientStatus(statusCode) ? 'retriable' : 'fatal';
  }
}

/** A control-plane read failed; throttling and server errors are retriable */
export class ControlPlaneRequestError extends WorkflowError {
  override readonly code = 'CONTROL_PLANE_REQUEST_FAILED';
  override readonly kind: FailureKind;

  constructor(
    readonly method: string,
    readonly target: string,
    readonly statusCode: number,
    detail?: string,
  ) {
    super(`${method} ${target} returned status ${statusCode}${detail ? `: ${detail}` : ''}`, {
      method,
      target,
      statusCode,
    });
    this.kind = isTransientStatus(statusCode) ? 'retriable' : 'fatal';
  }
}

export class DeadlineExceededError extends WorkflowError {
  override readonly code = 'DEADLINE_EXCEEDED';
  override readonly kind = 'fatal';

  constructor(message = 'Run deadline exceeded', context: Record<string, unknown> = {}) {
    super(message, context);
  }
}

export class InvalidDomainSetError extends WorkflowError {
  override readonly code = 'INVALID_DOMAIN_SET';
  override readonly kind = 'precondition';
}

export class ConfigurationError extends WorkflowError {
  override readonly code = 'INVALID_CONFIGURATION';
  override readonly kind = 'precondition';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}

/**
 * Map any thrown value to the outcome kind the orchestrator acts on
 */
export function classifyError(error: unknown): FailureKind {
  if (error instanceof WorkflowError) {
    return error.kind;
  }

  if (error instanceof AcmeError) {
    if (error instanceof RateLimitedError || error instanceof BadNonceError) {
      return 'retriable';
    }
    return error.status !== undefined && error.status >= 500 ? 'retriable' : 'fatal';
  }

  return isRetryableError(error) ? 'retriable' : 'fatal';
}
