/**
 * Source classification: remote URL or local path.
 */

/** Prefix check only; validation happens in the SSRF guard. */
export function isUrl(source: string): boolean {
  return source.startsWith('http://') || source.startsWith('https://');
}
