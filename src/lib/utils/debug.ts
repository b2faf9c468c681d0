/**
 * Debug logging for sitecert
 *
 * Namespaced loggers on top of the `debug` package. Enable with the DEBUG
 * environment variable:
 *
 * DEBUG=sitecert:*          - everything
 * DEBUG=sitecert:workflow   - orchestrator transitions only
 * DEBUG=sitecert:http       - outbound HTTP only
 */

import createDebug from 'debug';

const root = createDebug('sitecert');

export const debugAcme = root.extend('acme');
export const debugNonce = root.extend('nonce');
export const debugHttp = root.extend('http');
export const debugDns = root.extend('dns');
export const debugChallenge = root.extend('challenge');
export const debugWorkflow = root.extend('workflow');
export const debugDeploy = root.extend('deploy');
export const debugNotify = root.extend('notify');
export const debugMain = root.extend('main');
