/**
 * RFC 8555 ACME Order and Challenge Types
 *
 * Response bodies are validated with zod before they reach the workflow.
 */

import { z } from 'zod';
import { authorizationStatusSchema, challengeStatusSchema, orderStatusSchema } from './status.js';

export type {
  AcmeOrderStatus,
  AcmeAuthorizationStatus,
  AcmeChallengeStatus,
  AcmeChallengeType,
} from './status.js';

export const acmeIdentifierSchema = z.object({
  type: z.string(),
  value: z.string(),
});

/** RFC 7807 problem document as embedded in challenge and order objects */
export const acmeProblemSchema = z
  .object({
    type: z.string().optional(),
    detail: z.string().optional(),
    status: z.number().optional(),
  })
  .passthrough();

export const acmeChallengeSchema = z.object({
  type: z.string(),
  url: z.string(),
  status: challengeStatusSchema,
  token: z.string().default(''),
  validated: z.string().optional(),
  error: acmeProblemSchema.optional(),
});

export const acmeAuthorizationSchema = z.object({
  identifier: acmeIdentifierSchema,
  status: authorizationStatusSchema,
  expires: z.string().optional(),
  challenges: z.array(acmeChallengeSchema).default([]),
  wildcard: z.boolean().optional(),
});

/** Order body as the CA returns it; the URL comes from the Location header */
export const acmeOrderBodySchema = z.object({
  status: orderStatusSchema,
  expires: z.string().optional(),
  identifiers: z.array(acmeIdentifierSchema).default([]),
  authorizations: z.array(z.string()).default([]),
  finalize: z.string(),
  certificate: z.string().optional(),
  error: acmeProblemSchema.optional(),
});

export type AcmeIdentifier = z.infer<typeof acmeIdentifierSchema>;
export type AcmeProblem = z.infer<typeof acmeProblemSchema>;

/**
 * ACME Challenge according to RFC 8555
 */
export type AcmeChallenge = z.infer<typeof acmeChallengeSchema>;

/**
 * ACME Authorization according to RFC 8555
 */
export type AcmeAuthorization = z.infer<typeof acmeAuthorizationSchema>;

/**
 * ACME Order according to RFC 8555, with the order URL attached
 */
export type AcmeOrder = z.infer<typeof acmeOrderBodySchema> & {
  /** Order URL (Location header of newOrder) */
  url: string;
};
