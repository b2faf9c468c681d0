import { readFileSync } from 'fs';
import { z } from 'zod';

const packageJsonSchema = z.object({ name: z.string().optional(), version: z.string().optional() });

export interface PackageInfo {
  name: string;
  version: string;
}

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata (best-effort).
 * Tries several relative paths because this file runs from src/ under tests and dist/ when built.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = { name: 'sitecert', version: '0.0.0-dev' };

  const candidates = ['../../../package.json', '../../package.json', '../package.json'];

  for (const rel of candidates) {
    let data: unknown;
    try {
      const resolved = require.resolve(rel, { paths: [__dirname] });
      data = JSON.parse(readFileSync(resolved, 'utf-8'));
    } catch {
      continue;
    }
    const parsed = packageJsonSchema.safeParse(data);
    if (!parsed.success) continue;
    const raw = parsed.data;
    cachedPkg = {
      name: raw.name || defaults.name,
      version: raw.version || defaults.version,
    };
    return cachedPkg;
  }

  cachedPkg = defaults;
  return cachedPkg;
}

/** Build the User-Agent string sent on every outbound call */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} (Node/${process.version.replace(/^v/, '')})`;
}
