/**
 * RFC 8555 ACME Directory Types
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.1
 */

import { z } from 'zod';

export const acmeDirectorySchema = z.object({
  newNonce: z.string(),
  newAccount: z.string(),
  newOrder: z.string(),
  newAuthz: z.string().optional(),
  revokeCert: z.string().optional(),
  keyChange: z.string().optional(),
  meta: z
    .object({
      termsOfService: z.string().optional(),
      website: z.string().optional(),
      caaIdentities: z.array(z.string()).optional(),
      externalAccountRequired: z.boolean().optional(),
    })
    .optional(),
});

/**
 * ACME Directory structure as defined in RFC 8555
 */
export type AcmeDirectory = z.infer<typeof acmeDirectorySchema>;
