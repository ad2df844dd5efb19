import { getRandomValues } from "node:crypto";

/**
 * Unsigned 32-bit random integer from the platform CSPRNG. Used to pick
 * a seed when the caller does not supply one.
 */
export function randomUint32(): number {
  const buffer = new Uint32Array(1);
  getRandomValues(buffer);
  return buffer[0] >>> 0;
}
