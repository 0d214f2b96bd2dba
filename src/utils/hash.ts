/**
 * Non-cryptographic string hashing for bucket assignment.
 */

/**
 * 32-bit polynomial string hash (h * 31 + c), returned unsigned.
 * Stable across runs and platforms.
 */
export function stringHash(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) - hash) + str.charCodeAt(i);
    hash = hash & hash; // Convert to 32bit integer
  }
  return hash >>> 0;
}
