/**
 * canonicalId.ts
 *
 * Deterministic identifiers for cache file names.
 * - safeId() replaces characters that are unsafe in file names with underscores.
 * - cacheFileName() keeps distinct URLs apart even when they collapse to the same safeId.
 */

/**
 * safeId
 * Replace any characters outside [A-Za-z0-9_-] with underscores.
 * Collapse repeated underscores and trim leading/trailing underscores.
 */
export function safeId(value: string): string {
  const replaced = value.replace(/[^A-Za-z0-9_-]/g, "_");
  const collapsed = replaced.replace(/_+/g, "_");
  return collapsed.replace(/^_+|_+$/g, "") || "id";
}

// 32-bit FNV-1a, hex
function fingerprint(value: string): string {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash.toString(16).padStart(8, "0");
}

/**
 * Cache file name for a remote identifier, e.g.
 * `http://example.org/a.ttl` -> `http_example_org_a_ttl-1a2b3c4d`.
 */
export function cacheFileName(identifier: string): string {
  const trimmed = identifier.trim();
  return `${safeId(trimmed)}-${fingerprint(trimmed)}`;
}

