/**
 * ACME Error Codes (RFC 8555 Section 6.7)
 *
 * Problem document `type` URNs returned by ACME servers (RFC 7807).
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8555#section-6.7 | RFC 8555 Section 6.7 - Errors}
 */

const prefix = 'urn:ietf:params:acme:error:';

export const ACME_ERROR = {
  accountDoesNotExist: `${prefix}accountDoesNotExist`,
  badCSR: `${prefix}badCSR`,
  /** Retry with a fresh nonce from the Replay-Nonce header */
  badNonce: `${prefix}badNonce`,
  badPublicKey: `${prefix}badPublicKey`,
  badSignatureAlgorithm: `${prefix}badSignatureAlgorithm`,
  caa: `${prefix}caa`,
  /** Multiple errors; see `subproblems` */
  compound: `${prefix}compound`,
  connection: `${prefix}connection`,
  dns: `${prefix}dns`,
  externalAccountRequired: `${prefix}externalAccountRequired`,
  incorrectResponse: `${prefix}incorrectResponse`,
  invalidContact: `${prefix}invalidContact`,
  malformed: `${prefix}malformed`,
  orderNotReady: `${prefix}orderNotReady`,
  /** Carries a Retry-After header */
  rateLimited: `${prefix}rateLimited`,
  rejectedIdentifier: `${prefix}rejectedIdentifier`,
  serverInternal: `${prefix}serverInternal`,
  tls: `${prefix}tls`,
  unauthorized: `${prefix}unauthorized`,
  unsupportedContact: `${prefix}unsupportedContact`,
  unsupportedIdentifier: `${prefix}unsupportedIdentifier`,
  userActionRequired: `${prefix}userActionRequired`,
} as const;

export type AcmeErrorType = (typeof ACME_ERROR)[keyof typeof ACME_ERROR];
