/**
 * Custom Vitest Matcher Type Declarations for soil-stats
 */

import 'vitest';

interface CustomMatchers<R = unknown> {
  /**
   * Passes when |received - expected| <= tolerance * max(|expected|, |received|, 1)
   */
  toBeCloseToRelative(expected: number, tolerance?: number): R;
}

declare module 'vitest' {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  interface Assertion<T = any> extends CustomMatchers<T> {}
  interface AsymmetricMatchersContaining extends CustomMatchers {}
}
