import {
  AcmeError,
  AccountDoesNotExistError,
  BadCSRError,
  BadNonceError,
  CAAError,
  CompoundError,
  ConnectionError,
  DNSError,
  IncorrectResponseError,
  MalformedError,
  OrderNotReadyError,
  RateLimitedError,
  RejectedIdentifierError,
  ServerInternalError,
  ServerMaintenanceError,
  UnauthorizedError,
  UserActionRequiredError,
} from './acme-errors.js';
import { ACME_ERROR } from './codes.js';

type Ctor = new (detail?: string, status?: number) => AcmeError;

const FACTORY: Readonly<Record<string, Ctor | undefined>> = {
  [ACME_ERROR.accountDoesNotExist]: AccountDoesNotExistError,
  [ACME_ERROR.badCSR]: BadCSRError,
  [ACME_ERROR.badNonce]: BadNonceError,
  [ACME_ERROR.caa]: CAAError,
  [ACME_ERROR.compound]: CompoundError,
  [ACME_ERROR.connection]: ConnectionError,
  [ACME_ERROR.dns]: DNSError,
  [ACME_ERROR.incorrectResponse]: IncorrectResponseError,
  [ACME_ERROR.malformed]: MalformedError,
  [ACME_ERROR.orderNotReady]: OrderNotReadyError,
  [ACME_ERROR.rejectedIdentifier]: RejectedIdentifierError,
  [ACME_ERROR.serverInternal]: ServerInternalError,
  [ACME_ERROR.unauthorized]: UnauthorizedError,
};

interface Problem {
  type?: string;
  detail?: string;
  title?: string;
  status?: number;
  instance?: string;
  retryAfter?: string | number;
  subproblems?: unknown[];
}

function isProblem(value: unknown): value is Problem {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Map an RFC 7807 problem document (or anything else the server sent) to a typed error */
export function createErrorFromProblem(problem: unknown, fallbackStatus?: number): AcmeError {
  if (!isProblem(problem)) {
    return new AcmeError(
      typeof problem === 'string' && problem.length > 0 ? problem : 'Unknown error shape',
      fallbackStatus,
    );
  }

  const type = problem.type ?? ACME_ERROR.serverInternal;
  let effectiveType = type;
  const detail = problem.detail ?? problem.title ?? 'Unknown error';
  const status = problem.status ?? fallbackStatus;

  // Some CAs send 'Errors during validation' without the compound type
  if (
    (!problem.type || problem.type === ACME_ERROR.serverInternal) &&
    detail === 'Errors during validation' &&
    Array.isArray(problem.subproblems) &&
    problem.subproblems.length > 0
  ) {
    effectiveType = ACME_ERROR.compound;
  }

  let err: AcmeError;

  if (
    type === ACME_ERROR.serverInternal &&
    (detail.includes('maintenance') || detail.includes('service is down') || status === 503)
  ) {
    err = new ServerMaintenanceError(detail, status);
  } else if (effectiveType === ACME_ERROR.rateLimited) {
    const retryAfter = problem.retryAfter ? new Date(problem.retryAfter) : undefined;
    err = new RateLimitedError(detail, status ?? 429, retryAfter);
  } else if (effectiveType === ACME_ERROR.userActionRequired) {
    err = new UserActionRequiredError(detail, status ?? 403, problem.instance);
  } else {
    const ctor = FACTORY[effectiveType];
    err = ctor
      ? new ctor(detail, status)
      : new AcmeError(detail, status, { type: effectiveType, instance: problem.instance });
  }

  if (Array.isArray(problem.subproblems)) {
    for (const sub of problem.subproblems) {
      err.addSubproblem(createErrorFromProblem(sub));
    }
  }

  return err;
}
