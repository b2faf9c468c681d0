/**
 * Challenge proofs for HTTP-01 and DNS-01
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-8.3
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-8.4
 */

import { createHash } from 'node:crypto';

import type { AcmeApi } from '../types/acme-api.js';
import type { ChallengeResult, HttpProof, SiteRef } from '../types/domain.js';
import { AUTHORIZATION_STATUS, CHALLENGE_TYPE, type AcmeChallengeType } from '../types/status.js';
import type { HostingControlPlane } from '../providers/hosting.js';
import { isSuccess } from '../providers/hosting.js';
import { ChallengeTypeConflictError, DeploymentError } from '../errors/workflow-errors.js';
import { debugChallenge } from '../utils/debug.js';

export const HTTP01_PATH_PREFIX = '.well-known/acme-challenge/';

export function http01Path(token: string): string {
  return `${HTTP01_PATH_PREFIX}${token}`;
}

export function http01Url(identifier: string, token: string): string {
  return `http://${identifier}/${http01Path(token)}`;
}

/** `_acme-challenge.<name>`, with a leading wildcard label dropped */
export function dns01RecordName(identifier: string): string {
  return `_acme-challenge.${identifier.replace(/^\*\./, '')}`;
}

export function dns01Value(keyAuthorization: string): string {
  return createHash('sha256').update(keyAuthorization).digest('base64url');
}

export interface ChallengeResolverDeps {
  acme: AcmeApi;
  hosting: HostingControlPlane;
}

export class ChallengeResolver {
  constructor(private readonly deps: ChallengeResolverDeps) {}

  /** Proof for every authorization still pending, all of `challengeType`. Nothing is published yet. */
  async resolve(authorizationUrls: readonly string[], challengeType: AcmeChallengeType): Promise<ChallengeResult[]> {
    const results: ChallengeResult[] = [];

    for (const authzUrl of authorizationUrls) {
      const authorization = await this.deps.acme.getAuthorization(authzUrl);
      const identifier = authorization.identifier.value;

      if (authorization.status === AUTHORIZATION_STATUS.VALID) {
        debugChallenge('authorization for %s already valid, skipping', identifier);
        continue;
      }

      const challenge = authorization.challenges.find((ch) => ch.type === challengeType);
      if (!challenge) {
        throw new ChallengeTypeConflictError(
          identifier,
          challengeType,
          authorization.challenges.map((ch) => ch.type),
        );
      }

      const keyAuthorization = await this.deps.acme.keyAuthorization(challenge.token);
      // Wildcard authorizations carry the base name as identifier
      const name = authorization.wildcard ? `*.${identifier}` : identifier;

      switch (challengeType) {
        case CHALLENGE_TYPE.HTTP_01:
          results.push({
            challengeUrl: challenge.url,
            proof: {
              kind: 'http-01',
              url: http01Url(identifier, challenge.token),
              path: http01Path(challenge.token),
              value: keyAuthorization,
            },
          });
          break;
        case CHALLENGE_TYPE.DNS_01:
          results.push({
            challengeUrl: challenge.url,
            proof: { kind: 'dns-01', recordName: dns01RecordName(name), value: dns01Value(keyAuthorization) },
          });
          break;
      }

      debugChallenge('prepared %s proof for %s', challengeType, name);
    }

    return results;
  }

  /** Write each HTTP-01 proof file through the hosting control plane */
  async publishHttpProofs(site: SiteRef, proofs: readonly HttpProof[]): Promise<void> {
    for (const proof of proofs) {
      const result = await this.deps.hosting.writeFile(site, proof.path, proof.value);
      if (!isSuccess(result)) {
        throw new DeploymentError('writeFile', result.target, result.statusCode, result.payloadSize, result.detail);
      }
      debugChallenge('wrote %s', result.target);
    }
  }
}
