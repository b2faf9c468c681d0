import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

import { ACCOUNT_KEY_ALGORITHM, generateKeyPair, provider } from '../crypto/csr.js';
import type { AccountKeys } from './acme-account.js';
import { debugAcme } from '../utils/debug.js';
import { isNotFound } from '../utils/index.js';
import { ConfigurationError } from '../errors/workflow-errors.js';

const ecJwkSchema = z.object({
  kty: z.literal('EC'),
  crv: z.literal('P-256'),
  x: z.string(),
  y: z.string(),
  d: z.string().optional(),
});

const accountFileSchema = z.object({
  privateKey: ecJwkSchema,
  publicKey: ecJwkSchema,
  /** Account URL per directory URL */
  accounts: z.record(z.string()).default({}),
});

export type AccountFile = z.infer<typeof accountFileSchema>;

export interface StoredAccount {
  keys: AccountKeys;
  /** Known account URL for the directory, if registered before */
  kid: string | undefined;
}

const EC_IMPORT = { name: 'ECDSA', namedCurve: 'P-256' } as const;

/**
 * Account key file (JWK pair plus account URLs), created on first use
 */
export class AccountStore {
  constructor(private readonly path: string) {}

  async load(directoryUrl: string): Promise<StoredAccount> {
    const file = await this.readOrCreate();
    const privateKey = await provider.subtle.importKey('jwk', file.privateKey, EC_IMPORT, true, ['sign']);
    const { d: _d, ...publicJwk } = file.publicKey;
    const publicKey = await provider.subtle.importKey('jwk', publicJwk, EC_IMPORT, true, ['verify']);

    return { keys: { privateKey, publicKey }, kid: file.accounts[directoryUrl] };
  }

  async saveAccountUrl(directoryUrl: string, accountUrl: string): Promise<void> {
    const file = await this.readOrCreate();
    if (file.accounts[directoryUrl] === accountUrl) return;

    file.accounts[directoryUrl] = accountUrl;
    await this.write(file);
  }

  private async readOrCreate(): Promise<AccountFile> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return this.create();
      }
      throw err;
    }

    const parsed = accountFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new ConfigurationError([`invalid account key file ${this.path}: ${parsed.error.message}`]);
    }
    return parsed.data;
  }

  private async create(): Promise<AccountFile> {
    const pair = await generateKeyPair(ACCOUNT_KEY_ALGORITHM);
    const privateKey = ecJwkSchema.parse(await provider.subtle.exportKey('jwk', pair.privateKey));
    const publicKey = ecJwkSchema.parse(await provider.subtle.exportKey('jwk', pair.publicKey));

    const file: AccountFile = { privateKey, publicKey, accounts: {} };
    await this.write(file);
    debugAcme('created account key %s', this.path);
    return file;
  }

  private async write(file: AccountFile): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(file, null, 2), { mode: 0o600 });
    await rename(tmp, this.path);
  }
}
