export const MIN_COLLECTION_NAME_LENGTH = 3;
export const MAX_COLLECTION_NAME_LENGTH = 63;
export const SHORT_NAME_PREFIX = "disease_";

/**
 * Maps a human-facing domain name to its collection identifier.
 *
 * Lowercases, replaces every character outside `[a-z0-9]` with `_`, trims
 * leading and trailing underscores, prefixes names shorter than three
 * characters with `disease_` and truncates to 63 characters. Total and
 * deterministic: `""` maps to `"disease_"`, `"ab"` to `"disease_ab"`.
 */
export function toCollectionName(domain: string): string {
  let name = domain.toLowerCase().replace(/[^a-z0-9]/g, "_").replace(/^_+|_+$/g, "");

  if (name.length < MIN_COLLECTION_NAME_LENGTH) {
    name = SHORT_NAME_PREFIX + name;
  }

  return name.slice(0, MAX_COLLECTION_NAME_LENGTH);
}
