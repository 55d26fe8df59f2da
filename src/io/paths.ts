import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

export interface PathTokens {
  timestamp: string;
  seed?: number | string;
}

/** `YYYYMMDDTHHmm` in UTC, so a path does not depend on the host's zone. */
export function formatTimestampToken(ts: string): string {
  const d = new Date(ts);
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}T${pad(
    d.getUTCHours(),
  )}${pad(d.getUTCMinutes())}`;
}

/** Expand `${timestamp}` and `${seed}` in an output path. */
export function expandOutputPath(template: string, tokens: PathTokens): string {
  const ts = formatTimestampToken(tokens.timestamp);
  return template.replace(/\$\{(timestamp|seed)\}/g, (_, k: string) =>
    k === 'timestamp' ? ts : tokens.seed !== undefined ? String(tokens.seed) : '',
  );
}

export function writeOutput(path: string, contents: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, contents, 'utf8');
  console.log(`Wrote ${path}`);
}
