import { createHash } from 'node:crypto';
import { homedir } from 'node:os';

const home = homedir();

/**
 * Strip the home directory prefix from anything that is about to be logged,
 * so paths show up as `~/clips/a.mp4` rather than naming the account.
 */
export function redact(input: string): string {
  if (!home || home === '/') return input;
  return input.split(home).join('~');
}

/**
 * SHA-256 hash of a canonical JSON representation (object keys sorted at every depth).
 */
export function jsonHash(obj: unknown): string {
  return createHash('sha256').update(canonicalJson(obj)).digest('hex');
}

export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => canonicalJson(v)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}
