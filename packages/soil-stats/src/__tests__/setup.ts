/**
 * Global Test Setup for soil-stats
 *
 * - custom matchers
 * - engine logging limited to errors so test output stays readable
 *
 * TYPE SAFETY: No `any`, no loose casts.
 */

import { expect } from 'vitest';
import { setLogLevel } from '../core/utils/logger.js';

setLogLevel('error');

// ============================================================================
// Custom Matchers
// ============================================================================

expect.extend({
  /**
   * Relative closeness, for sums that must match within floating-point
   * tolerance.
   *
   * ```typescript
   * expect(sumOfChildren).toBeCloseToRelative(parentTotal, 1e-6);
   * ```
   */
  toBeCloseToRelative(received: number, expected: number, tolerance = 1e-6) {
    const scale = Math.max(Math.abs(expected), Math.abs(received), 1);
    const pass = Math.abs(received - expected) <= tolerance * scale;
    return {
      pass,
      message: () =>
        pass
          ? `expected ${received} not to be within ${tolerance} (relative) of ${expected}`
          : `expected ${received} to be within ${tolerance} (relative) of ${expected}`,
    };
  },
});
