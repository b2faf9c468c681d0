// ACME directory presets for the certificate authorities sitecert issues from

/**
 * ACME directory entry for a specific environment
 */
export interface AcmeDirectoryEntry {
  /** The ACME directory URL for this environment */
  directoryUrl: string;
  /** Human-readable name for this directory */
  name: string;
  /** Environment type: staging or production */
  environment: 'staging' | 'production';
}

export interface AcmeProvider {
  staging?: AcmeDirectoryEntry;
  production: AcmeDirectoryEntry;
}

export interface AcmeDirectoryConfig {
  /** Let's Encrypt certificate authority */
  letsencrypt: Required<AcmeProvider>;
  /** Buypass certificate authority */
  buypass: Required<AcmeProvider>;
}

/**
 * Pre-configured ACME directories.
 *
 * @example
 * ```typescript
 * import { directory } from 'sitecert';
 *
 * const endpoint = directory.letsencrypt.staging.directoryUrl;
 * ```
 */
export const directory: AcmeDirectoryConfig = {
  letsencrypt: {
    staging: {
      directoryUrl: 'https://acme-staging-v02.api.letsencrypt.org/directory',
      name: "Let's Encrypt Staging",
      environment: 'staging',
    },
    production: {
      directoryUrl: 'https://acme-v02.api.letsencrypt.org/directory',
      name: "Let's Encrypt Production",
      environment: 'production',
    },
  },
  buypass: {
    staging: {
      directoryUrl: 'https://api.test4.buypass.no/acme/directory',
      name: 'Buypass Staging',
      environment: 'staging',
    },
    production: {
      directoryUrl: 'https://api.buypass.com/acme/directory',
      name: 'Buypass Production',
      environment: 'production',
    },
  },
};

const PRESETS: Readonly<Record<string, AcmeDirectoryEntry>> = {
  'letsencrypt': directory.letsencrypt.production,
  'letsencrypt-staging': directory.letsencrypt.staging,
  'buypass': directory.buypass.production,
  'buypass-staging': directory.buypass.staging,
};

/**
 * Directory URL for a preset name (`letsencrypt`, `letsencrypt-staging`,
 * `buypass`, `buypass-staging`) or an https URL. Returns undefined for
 * anything else.
 */
export function resolveEndpoint(nameOrUrl: string): string | undefined {
  const preset = PRESETS[nameOrUrl.trim().toLowerCase()];
  if (preset) return preset.directoryUrl;

  try {
    const url = new URL(nameOrUrl);
    return url.protocol === 'https:' ? url.toString() : undefined;
  } catch {
    return undefined;
  }
}

export function presetNames(): string[] {
  return Object.keys(PRESETS);
}
