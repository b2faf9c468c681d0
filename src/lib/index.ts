/**
 * sitecert library exports
 */

// ACME protocol
export { AcmeClient, type AcmeClientOptions } from './core/acme-client.js';
export { AcmeAccount, type AcmeAccountOptions, type AccountKeys, type AccountRegistration } from './core/acme-account.js';
export { AccountStore, type StoredAccount } from './core/account-store.js';
export { NonceManager, type NonceManagerOptions } from './managers/nonce-manager.js';
export type { AcmeApi } from './types/acme-api.js';

// Errors
export {
  AcmeError,
  AccountDoesNotExistError,
  BadCSRError,
  BadNonceError,
  CAAError,
  CompoundError,
  ConnectionError,
  DNSError,
  IncorrectResponseError,
  MalformedError,
  OrderNotReadyError,
  RateLimitedError,
  RejectedIdentifierError,
  ServerInternalError,
  ServerMaintenanceError,
  UnauthorizedError,
  UserActionRequiredError,
} from './errors/acme-errors.js';
export { createErrorFromProblem } from './errors/factory.js';
export { ACME_ERROR, type AcmeErrorType } from './errors/codes.js';
export {
  WorkflowError,
  ZoneNotFoundError,
  NameServerMismatchError,
  ChallengeTypeConflictError,
  SiteNotFoundError,
  RetriableValidationError,
  RetriableActivityError,
  RestartRequiredError,
  FinalizeError,
  DeploymentError,
  ControlPlaneRequestError,
  DeadlineExceededError,
  InvalidDomainSetError,
  ConfigurationError,
  isWorkflowError,
  classifyError,
  type FailureKind,
} from './errors/workflow-errors.js';

// Types
export type { AcmeDirectory } from './types/directory.js';
export type { AcmeOrder, AcmeAuthorization, AcmeChallenge, AcmeIdentifier, AcmeProblem } from './types/order.js';
export {
  ORDER_STATUS,
  AUTHORIZATION_STATUS,
  CHALLENGE_STATUS,
  CHALLENGE_TYPE,
  type AcmeOrderStatus,
  type AcmeAuthorizationStatus,
  type AcmeChallengeStatus,
  type AcmeChallengeType,
} from './types/status.js';
export {
  siteKey,
  parseSiteRef,
  toSiteRef,
  type Zone,
  type HttpProof,
  type DnsProof,
  type ChallengeProof,
  type ChallengeResult,
  type SiteRef,
  type IssuedCertificate,
  type IssuanceJob,
} from './types/domain.js';

// DNS
export { findZone, matchZones, verifyDelegation } from './dns/zone-matcher.js';
export {
  ACME_CHALLENGE_TTL,
  groupDnsProofs,
  relativeLabel,
  upsertChallengeRecords,
  deleteChallengeRecords,
  type TxtRecordGroup,
} from './dns/txt-records.js';
export { NodeDnsResolver, type LiveDnsResolver, type NodeDnsResolverOptions } from './dns/resolver.js';

// Challenges
export { ChallengeResolver, http01Path, http01Url, dns01RecordName, dns01Value } from './challenges/challenge-resolver.js';
export { ChallengeVerifier, createHttpProbe, type HttpProbe, type ProbeResponse } from './challenges/challenge-verifier.js';

// Issuance and deployment
export { ValidationPoller, fixedIntervalRetry, type PollOptions } from './core/validation-poller.js';
export { CertificateFinalizer, type CertificateFinalizerOptions } from './core/certificate-finalizer.js';
export { Deployer, certificateName, issuerTags, isOwnCertificate, ISSUER_TAG_VALUE } from './core/deployer.js';
export { createAcmeCsr, generateKeyPair, CERTIFICATE_KEY_ALGORITHM, ACCOUNT_KEY_ALGORITHM } from './crypto/csr.js';
export { buildPfx, readCertificateInfo, selectPreferredChain, splitPemChain, thumbprintOf } from './crypto/certificate.js';

// Providers
export type { DnsProvider, TxtRecordSet } from './providers/dns-provider.js';
export type {
  HostingControlPlane,
  HostedSite,
  HostingCertificate,
  HostNameSslState,
  ImportCertificateRequest,
  ControlPlaneResult,
} from './providers/hosting.js';
export { ArmClient, type ArmClientOptions } from './providers/arm/arm-client.js';
export { ArmHostingControlPlane } from './providers/arm/arm-hosting.js';
export { ArmDnsProvider } from './providers/arm/arm-dns.js';

// Notifications
export { WebhookNotifier, NoopNotifier, type CompletionNotifier, type CompletionEvent } from './notifications/webhook.js';

// Workflow
export { createDomainSet, createIssuanceJob, normalizeDnsName } from './workflow/job.js';
export { WORKFLOW_STEP, workflowStateSchema, type WorkflowState, type WorkflowStep } from './workflow/state.js';
export { MemoryCheckpointStore, FileCheckpointStore, type CheckpointStore } from './workflow/checkpoint-store.js';
export { ok, failed, attempt, type Outcome } from './workflow/outcome.js';
export {
  IssuanceOrchestrator,
  sharedZones,
  type OrchestratorDeps,
  type OrchestratorOptions,
  type IssuanceResult,
  type RunOptions,
} from './workflow/orchestrator.js';
export { findExpiringCertificates, listCustomDomainSites, planRenewals, customHostNames } from './workflow/renewal.js';

// Configuration
export { loadConfig, parseConfig, configFromEnv, resourceManagerUrl, type SitecertConfig } from './config/config.js';
export { CLOUD_ENVIRONMENTS, type CloudEnvironment, type CloudEnvironmentName } from './config/environments.js';
export { createRuntime, createArmClient, bootstrapAccount, type Runtime, type BootstrapOptions } from './bootstrap.js';

// Transport
export { HttpClient, type HttpClientOptions, type HttpResponse } from './transport/http-client.js';
export { withRetry, isRetryableError, type RetryConfig } from './transport/retry.js';

// Logging
export { setLogger } from './utils/logger.js';
