/**
 * ACME object states (RFC 8555 section 7.1.6) and the challenge types the
 * workflow answers. Each constant has a zod schema for response parsing.
 */

import { z } from 'zod';

/** pending -> ready -> processing -> valid; invalid from any of them */
export const ORDER_STATUS = {
  PENDING: 'pending',
  READY: 'ready',
  PROCESSING: 'processing',
  VALID: 'valid',
  INVALID: 'invalid',
} as const;

export const orderStatusSchema = z.nativeEnum(ORDER_STATUS);
export type AcmeOrderStatus = z.infer<typeof orderStatusSchema>;

export const AUTHORIZATION_STATUS = {
  PENDING: 'pending',
  VALID: 'valid',
  INVALID: 'invalid',
  DEACTIVATED: 'deactivated',
  EXPIRED: 'expired',
  REVOKED: 'revoked',
} as const;

export const authorizationStatusSchema = z.nativeEnum(AUTHORIZATION_STATUS);
export type AcmeAuthorizationStatus = z.infer<typeof authorizationStatusSchema>;

export const CHALLENGE_STATUS = {
  PENDING: 'pending',
  PROCESSING: 'processing',
  VALID: 'valid',
  INVALID: 'invalid',
} as const;

export const challengeStatusSchema = z.nativeEnum(CHALLENGE_STATUS);
export type AcmeChallengeStatus = z.infer<typeof challengeStatusSchema>;

/** tls-alpn-01 and others are parsed but never selected */
export const CHALLENGE_TYPE = {
  HTTP_01: 'http-01',
  DNS_01: 'dns-01',
} as const;

export type AcmeChallengeType = (typeof CHALLENGE_TYPE)[keyof typeof CHALLENGE_TYPE];

/** An invalid order is dead; any other state can be carried on after a resume */
export function isUsableOrderStatus(status: AcmeOrderStatus): boolean {
  return status !== ORDER_STATUS.INVALID;
}
