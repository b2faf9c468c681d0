/**
 * sitecert - ACME certificates for hosted custom domains
 */

export { directory, resolveEndpoint, presetNames } from './directory.js';
export type { AcmeDirectoryEntry, AcmeProvider, AcmeDirectoryConfig } from './directory.js';

export * from './lib/index.js';
