// Logical times are seconds as floats. Deltas are quantized to whole
// microseconds before any comparison against a tolerance window, so that
// 1.1 - 1.0 compares as exactly 100 ms.

const MICROS_PER_SECOND = 1_000_000;

/** Signed difference `a - b` in milliseconds, quantized to microseconds. */
export function deltaMs(a: number, b: number): number {
  return Math.round((a - b) * MICROS_PER_SECOND) / 1000;
}

