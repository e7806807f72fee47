/**
 * @textrelay/core - Placeholder credential detection
 *
 * Example configs and .env templates ship values such as
 * "your_openai_api_key_here". Those are treated exactly like a missing key.
 */

/** Reference prefix resolved from the environment by the loader. */
export const ENV_REF_PREFIX = '$env:';

const PLACEHOLDER_PATTERNS: RegExp[] = [
  /^your[_-].*[_-]here$/i,
  /^<.*>$/,
  /^x{3,}$/i,
  /^(changeme|change[_-]me|placeholder|todo|none|null|undefined)$/i,
  /^sk-\.\.\.$/,
];

/**
 * Returns true when `value` cannot be a usable credential: undefined, blank,
 * an unresolved `$env:` reference, or a documented template value.
 */
export function isPlaceholderCredential(value: string | undefined | null): boolean {
  if (value === undefined || value === null) return true;

  const trimmed = value.trim();
  if (trimmed.length === 0) return true;
  if (trimmed.startsWith(ENV_REF_PREFIX)) return true;

  return PLACEHOLDER_PATTERNS.some((re) => re.test(trimmed));
}
