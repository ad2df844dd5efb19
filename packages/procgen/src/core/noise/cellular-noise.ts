/**
 * Cellular ("cell value") noise.
 *
 * Space is divided into unit cells, each holding one jittered feature
 * point. A sample returns the value hashed from the cell whose feature
 * point lies nearest, so the field is made of flat patches with
 * organic borders.
 */

const X_PRIME = 1619;
const Y_PRIME = 31337;

/** Feature points stay within ±JITTER of their cell centre */
const JITTER = 0.45;

function coordHash(seed: number, x: number, y: number): number {
  return (seed ^ Math.imul(X_PRIME, x) ^ Math.imul(Y_PRIME, y)) | 0;
}

/**
 * Hash of a cell mapped to [-1, 1)
 */
export function cellValue(seed: number, x: number, y: number): number {
  const n = coordHash(seed, x, y);
  return Math.imul(Math.imul(Math.imul(n, n), n), 60493) / 2147483648;
}

function jitterOffsets(seed: number, x: number, y: number): [number, number] {
  let h = coordHash(seed, x, y);
  h = Math.imul(h ^ (h >>> 16), 0x45d9f3b);
  h = Math.imul(h ^ (h >>> 16), 0x45d9f3b);
  h = (h ^ (h >>> 16)) >>> 0;
  const jx = ((h & 0xffff) / 0xffff - 0.5) * 2 * JITTER;
  const jy = ((h >>> 16) / 0xffff - 0.5) * 2 * JITTER;
  return [jx, jy];
}

/**
 * Sample the noise field at (x, y). Returns a value in [-1, 1).
 */
export function cellValueNoise(
  seed: number,
  frequency: number,
  x: number,
  y: number,
): number {
  const fx = x * frequency;
  const fy = y * frequency;
  const cx = Math.round(fx);
  const cy = Math.round(fy);

  let bestDistance = Infinity;
  let bestX = cx;
  let bestY = cy;

  for (let xi = cx - 1; xi <= cx + 1; xi++) {
    for (let yi = cy - 1; yi <= cy + 1; yi++) {
      const [jx, jy] = jitterOffsets(seed, xi, yi);
      const dx = xi + jx - fx;
      const dy = yi + jy - fy;
      const distance = dx * dx + dy * dy;
      if (distance < bestDistance) {
        bestDistance = distance;
        bestX = xi;
        bestY = yi;
      }
    }
  }

  return cellValue(seed, bestX, bestY);
}
