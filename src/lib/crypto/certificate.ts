/**
 * Certificate chain handling and PKCS#12 bundling
 */

import { createHash, randomBytes } from 'node:crypto';
import { X509Certificate } from '@peculiar/x509';
import * as forge from 'node-forge';

const PEM_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/** Split a PEM chain into its certificates, leaf first */
export function splitPemChain(chain: string): string[] {
  return chain.match(PEM_BLOCK) ?? [];
}

/** Value of the first CN attribute in a distinguished name string */
export function commonNameOf(distinguishedName: string): string | undefined {
  const match = /(?:^|,)\s*CN=((?:\\.|[^,\\])*)/i.exec(distinguishedName);
  return match?.[1]?.replace(/\\(.)/g, '$1').trim();
}

/** Issuer CN of the top-most certificate of a chain */
export function topIssuerCommonName(chain: string): string | undefined {
  const certs = splitPemChain(chain);
  const top = certs[certs.length - 1];
  return top === undefined ? undefined : commonNameOf(new X509Certificate(top).issuer);
}

/**
 * Pick the chain whose top issuer CN equals `preferredChain` (case-insensitive).
 * Falls back to the first (default) chain.
 */
export function selectPreferredChain(chains: string[], preferredChain?: string): string | undefined {
  if (!preferredChain) {
    return chains[0];
  }

  const wanted = preferredChain.toLowerCase();
  return chains.find((chain) => topIssuerCommonName(chain)?.toLowerCase() === wanted) ?? chains[0];
}

export interface CertificateInfo {
  /** Uppercase SHA-1 hex of the DER encoding */
  thumbprint: string;
  notAfter: Date;
  subjectCommonName: string | undefined;
  issuerCommonName: string | undefined;
}

export function readCertificateInfo(pem: string): CertificateInfo {
  const cert = new X509Certificate(pem);
  return {
    thumbprint: thumbprintOf(Buffer.from(cert.rawData)),
    notAfter: cert.notAfter,
    subjectCommonName: commonNameOf(cert.subject),
    issuerCommonName: commonNameOf(cert.issuer),
  };
}

export function thumbprintOf(der: Buffer): string {
  return createHash('sha1').update(der).digest('hex').toUpperCase();
}

/** Random transport passphrase for one bundle */
export function generatePassphrase(): string {
  return randomBytes(24).toString('base64url');
}

/**
 * PKCS#12 bundle of leaf + chain + private key (3DES, as most hosting
 * importers still expect)
 */
export function buildPfx(chainPem: string, privateKeyPem: string, passphrase: string): Buffer {
  const certs = splitPemChain(chainPem).map((pem) => forge.pki.certificateFromPem(pem));
  if (certs.length === 0) {
    throw new Error('Certificate chain is empty');
  }

  const key = forge.pki.privateKeyFromPem(privateKeyPem);
  const p12 = forge.pkcs12.toPkcs12Asn1(key, certs, passphrase, { algorithm: '3des' });

  return Buffer.from(forge.asn1.toDer(p12).getBytes(), 'binary');
}
