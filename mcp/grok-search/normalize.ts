/**
 * Endpoint and credential normalization
 *
 * An empty return value means "not configured". Placeholder values copied
 * from example configs are treated the same as missing ones.
 */

export const CREDENTIAL_PLACEHOLDERS: ReadonlySet<string> = new Set([
  'YOUR_API_KEY',
  'API_KEY',
  'CHANGE_ME',
  'REPLACE_ME',
]);

export const ENDPOINT_PLACEHOLDERS: ReadonlySet<string> = new Set([
  'HTTPS://YOUR-GROK-ENDPOINT.EXAMPLE',
  'YOUR_BASE_URL',
  'BASE_URL',
  'CHANGE_ME',
  'REPLACE_ME',
]);

/**
 * Case-insensitive placeholder check. Set members are stored upper-case.
 */
export function isPlaceholder(
  value: string,
  placeholders: ReadonlySet<string>,
): boolean {
  return placeholders.has(value.trim().toUpperCase());
}

export function normalizeCredential(
  value: string,
  placeholders: ReadonlySet<string> = CREDENTIAL_PLACEHOLDERS,
): string {
  const trimmed = value.trim();
  if (!trimmed || isPlaceholder(trimmed, placeholders)) return '';
  return trimmed;
}

/**
 * Strip trailing slashes and a trailing `/v1` until the value stops changing,
 * so `/v1/chat/completions` can always be appended.
 */
export function canonicalizeEndpoint(value: string): string {
  let current = value.trim();
  for (;;) {
    let next = current.replace(/\/+$/, '');
    if (next.endsWith('/v1')) next = next.slice(0, -'/v1'.length);
    if (next === current) return current;
    current = next;
  }
}

export function normalizeEndpoint(
  value: string,
  placeholders: ReadonlySet<string> = ENDPOINT_PLACEHOLDERS,
): string {
  const trimmed = value.trim();
  if (!trimmed || isPlaceholder(trimmed, placeholders)) return '';

  const canonical = canonicalizeEndpoint(trimmed);
  if (!canonical || isPlaceholder(canonical, placeholders)) return '';
  return canonical;
}
