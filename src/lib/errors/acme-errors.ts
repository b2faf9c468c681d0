/**
 * ACME server errors (RFC 8555 problem documents)
 *
 * One class per problem type the workflow reacts to. Anything else maps to the
 * base AcmeError with its original `type` preserved.
 */

import { ACME_ERROR } from './codes.js';

export class AcmeError extends Error {
  type: string;
  detail: string;
  subproblems?: AcmeError[] | undefined;
  status?: number | undefined;
  instance: string | undefined;

  constructor(
    detail: string,
    status?: number,
    opts?: { type?: string; instance?: string; cause?: unknown },
  ) {
    super(detail, { cause: opts?.cause });
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = new.target.name;
    this.detail = detail;
    this.status = status ?? 500;
    this.type = opts?.type ?? ACME_ERROR.serverInternal;
    this.instance = opts?.instance;
  }

  toJSON(): Record<string, unknown> {
    const res: Record<string, unknown> = { type: this.type, detail: this.detail };

    if (this.status !== undefined) {
      res.status = this.status;
    }

    if (this.instance) {
      res.instance = this.instance;
    }

    if (this.subproblems?.length) {
      res.subproblems = this.subproblems.map((p) => p.toJSON());
    }

    return res;
  }

  addSubproblem(error: AcmeError): this {
    (this.subproblems ??= []).push(error);

    return this;
  }
}

export class AccountDoesNotExistError extends AcmeError {
  constructor(detail = 'The request specified an account that does not exist', status = 400) {
    super(detail, status, { type: ACME_ERROR.accountDoesNotExist });
  }
}

export class BadCSRError extends AcmeError {
  constructor(detail = 'The CSR is unacceptable (e.g., due to a short key)', status = 400) {
    super(detail, status, { type: ACME_ERROR.badCSR });
  }
}

export class BadNonceError extends AcmeError {
  constructor(detail = 'The client sent an unacceptable anti-replay nonce', status = 400) {
    super(detail, status, { type: ACME_ERROR.badNonce });
  }
}

export class CAAError extends AcmeError {
  constructor(detail = 'CAA records forbid the CA from issuing a certificate', status = 403) {
    super(detail, status, { type: ACME_ERROR.caa });
  }
}

/**
 * Multiple errors occurred; the individual problems are in `subproblems`
 */
export class CompoundError extends AcmeError {
  constructor(detail = 'Specific error conditions are indicated in the subproblems', status = 403) {
    super(detail, status, { type: ACME_ERROR.compound });
  }
}

export class ConnectionError extends AcmeError {
  constructor(detail = 'The server could not connect to validation target', status = 400) {
    super(detail, status, { type: ACME_ERROR.connection });
  }
}

export class DNSError extends AcmeError {
  constructor(detail = 'There was a problem with a DNS query during identifier validation', status = 400) {
    super(detail, status, { type: ACME_ERROR.dns });
  }
}

export class IncorrectResponseError extends AcmeError {
  constructor(detail = "Response received didn't match the challenge's requirements", status = 403) {
    super(detail, status, { type: ACME_ERROR.incorrectResponse });
  }
}

export class MalformedError extends AcmeError {
  constructor(detail = 'The request message was malformed', status = 400) {
    super(detail, status, { type: ACME_ERROR.malformed });
  }
}

export class OrderNotReadyError extends AcmeError {
  constructor(detail = 'The request attempted to finalize an order that is not ready', status = 403) {
    super(detail, status, { type: ACME_ERROR.orderNotReady });
  }
}

export class RateLimitedError extends AcmeError {
  retryAfter?: Date | undefined;

  constructor(detail = 'The request exceeds a rate limit', status = 429, retryAfter?: Date) {
    super(detail, status, { type: ACME_ERROR.rateLimited });
    this.retryAfter = retryAfter;
  }
}

export class RejectedIdentifierError extends AcmeError {
  constructor(detail = 'The server will not issue certificates for the identifier', status = 400) {
    super(detail, status, { type: ACME_ERROR.rejectedIdentifier });
  }
}

export class ServerInternalError extends AcmeError {
  constructor(detail = 'The server experienced an internal error', status = 500) {
    super(detail, status, { type: ACME_ERROR.serverInternal });
  }
}

/** Maintenance windows are reported as serverInternal/503; kept separate for the CLI */
export class ServerMaintenanceError extends AcmeError {
  constructor(detail = 'The service is down for maintenance', status = 503) {
    super(detail, status, { type: ACME_ERROR.serverInternal });
  }
}

export class UnauthorizedError extends AcmeError {
  constructor(detail = 'The client lacks sufficient authorization', status = 403) {
    super(detail, status, { type: ACME_ERROR.unauthorized });
  }
}

export class UserActionRequiredError extends AcmeError {
  constructor(
    detail = 'Visit the "instance" URL and take actions specified there',
    status = 403,
    instance?: string,
  ) {
    super(detail, status, { type: ACME_ERROR.userActionRequired, instance });
  }
}
