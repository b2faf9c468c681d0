export interface LinkHeaderEntry {
  url: string;
  rel: string | undefined;
}

/**
 * Parse RFC 8288 Link header values (`<url>;rel="alternate", <url2>;rel="up"`)
 */
export function parseLinkHeader(values: string[]): LinkHeaderEntry[] {
  const entries: LinkHeaderEntry[] = [];

  for (const value of values) {
    for (const part of value.split(/,(?=\s*<)/)) {
      const match = /^\s*<([^>]*)>(.*)$/.exec(part);
      if (!match?.[1]) continue;

      const rel = /;\s*rel="?([^";]+)"?/i.exec(match[2] ?? '')?.[1];
      entries.push({ url: match[1], rel });
    }
  }

  return entries;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
