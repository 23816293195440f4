import { createHash } from 'crypto';

/**
 * Cache key for an embedded diagram: SHA-1 over the source text followed by
 * the auxiliary render input (the resolved font for TikZ, empty for Graphviz).
 * Any change to either yields a different key.
 */
export function addressOf(payload: string, auxiliary: string): string {
  return createHash('sha1').update(payload + auxiliary, 'utf8').digest('hex');
}
