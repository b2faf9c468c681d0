import type { AcmeAuthorization, AcmeChallenge, AcmeOrder } from './order.js';

/**
 * The ACME operations the workflow needs. `AcmeAccount` implements it over
 * the wire; tests substitute an in-process CA.
 */
export interface AcmeApi {
  createOrder(dnsNames: string[]): Promise<AcmeOrder>;
  getOrder(orderUrl: string): Promise<AcmeOrder>;
  getAuthorization(authzUrl: string): Promise<AcmeAuthorization>;
  getChallenge(challengeUrl: string): Promise<AcmeChallenge>;
  /** Tell the CA the proof is in place */
  answerChallenge(challengeUrl: string): Promise<AcmeChallenge>;
  /** `token + '.' + base64url(JWK thumbprint)` of the account key */
  keyAuthorization(token: string): Promise<string>;
  finalize(order: AcmeOrder, csrDerBase64Url: string): Promise<AcmeOrder>;
  /**
   * PEM chain for a valid order. With `preferredChain`, the chain whose top
   * issuer CN matches wins among the alternates.
   */
  downloadCertificate(order: AcmeOrder, preferredChain?: string): Promise<string>;
}
