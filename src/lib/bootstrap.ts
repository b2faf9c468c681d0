/**
 * Wires the live collaborators from a loaded configuration
 */

import { join } from 'node:path';
import type { Dispatcher } from 'undici';

import type { SitecertConfig } from './config/config.js';
import { resourceManagerUrl } from './config/config.js';
import { AcmeClient } from './core/acme-client.js';
import { AcmeAccount } from './core/acme-account.js';
import { AccountStore } from './core/account-store.js';
import { ArmClient } from './providers/arm/arm-client.js';
import { ArmHostingControlPlane } from './providers/arm/arm-hosting.js';
import { ArmDnsProvider } from './providers/arm/arm-dns.js';
import { NodeDnsResolver } from './dns/resolver.js';
import { HttpClient } from './transport/http-client.js';
import { createHttpProbe } from './challenges/challenge-verifier.js';
import { NoopNotifier, WebhookNotifier, type CompletionNotifier } from './notifications/webhook.js';
import { FileCheckpointStore } from './workflow/checkpoint-store.js';
import { IssuanceOrchestrator, type OrchestratorDeps } from './workflow/orchestrator.js';
import { ConfigurationError } from './errors/workflow-errors.js';
import { debugMain } from './utils/debug.js';

export interface Runtime {
  config: SitecertConfig;
  account: AcmeAccount;
  deps: OrchestratorDeps;
  orchestrator: IssuanceOrchestrator;
}

export interface BootstrapOptions {
  /** Shared by every HTTP client; tests pass an undici MockAgent */
  dispatcher?: Dispatcher;
}

/**
 * Load (or create) the account key in the checkpoint directory and register
 * the account with the CA when it has no URL for this endpoint yet
 */
export async function bootstrapAccount(config: SitecertConfig, client: AcmeClient): Promise<AcmeAccount> {
  const store = new AccountStore(join(config.checkpointDir, 'account.json'));
  const stored = await store.load(config.endpoint);
  const account = new AcmeAccount(client, stored.keys, { kid: stored.kid, contact: config.contacts });

  if (!stored.kid) {
    const registration = await account.register();
    await store.saveAccountUrl(config.endpoint, registration.accountUrl);
    debugMain('registered account %s (%s)', registration.accountUrl, registration.status);
  }

  return account;
}

/** Resource manager client; the control-plane section is required */
export function createArmClient(config: SitecertConfig, opts: BootstrapOptions = {}): ArmClient {
  const controlPlane = config.controlPlane;
  if (!controlPlane) {
    throw new ConfigurationError(['controlPlane.subscriptionId and controlPlane.token are required']);
  }

  return new ArmClient({
    baseUrl: resourceManagerUrl(config),
    subscriptionId: controlPlane.subscriptionId,
    token: controlPlane.token,
    http: opts.dispatcher ? { dispatcher: opts.dispatcher } : {},
  });
}

export async function createRuntime(config: SitecertConfig, opts: BootstrapOptions = {}): Promise<Runtime> {
  const arm = createArmClient(config, opts);
  const http = opts.dispatcher ? { dispatcher: opts.dispatcher } : {};
  const client = new AcmeClient(config.endpoint, { http });
  const account = await bootstrapAccount(config, client);

  const plain = new HttpClient(http);
  const notifier: CompletionNotifier = config.webhookUrl
    ? new WebhookNotifier(config.webhookUrl, plain)
    : new NoopNotifier();

  const deps: OrchestratorDeps = {
    acme: account,
    dns: new ArmDnsProvider(arm),
    hosting: new ArmHostingControlPlane(arm, { appServiceSuffix: config.dnsSuffixes.appService }),
    liveDns: new NodeDnsResolver(),
    probe: createHttpProbe(plain),
    checkpoints: new FileCheckpointStore(join(config.checkpointDir, 'state')),
    notifier,
  };

  const orchestrator = new IssuanceOrchestrator(deps, {
    endpoint: config.endpoint,
    maxRestarts: config.maxRestarts,
    pollIntervalMs: config.pollIntervalMs,
    pollMaxAttempts: config.pollMaxAttempts,
    verifyIntervalMs: config.verifyIntervalMs,
    verifyMaxAttempts: config.verifyMaxAttempts,
    runDeadlineMs: config.runDeadlineMs,
    preferredChain: config.preferredChain,
  });

  return { config, account, deps, orchestrator };
}
