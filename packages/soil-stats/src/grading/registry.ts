/**
 * GradingStandardRegistry
 *
 * Holds the loaded grading standards and one "active" pointer used by
 * callers that do not name a standard. Engine functions never read the
 * active pointer: callers resolve a standard once and pass it down, so a
 * switch can never leave stale classifications behind.
 */

import type { GradingStandard, GradingStandardInfo } from '../core/types/grading.js';
import { GradingStandardNotFoundError } from '../core/types/errors.js';

export class GradingStandardRegistry {
  private readonly standards = new Map<string, GradingStandard>();
  private activeStandardId: string | null = null;

  /**
   * Add or replace a standard. The first registered standard becomes active.
   */
  register(id: string, standard: GradingStandard): void {
    this.standards.set(id, standard);
    if (this.activeStandardId === null) {
      this.activeStandardId = id;
    }
  }

  has(id: string): boolean {
    return this.standards.has(id);
  }

  get(id: string): GradingStandard | undefined {
    return this.standards.get(id);
  }

  /**
   * @throws GradingStandardNotFoundError for unknown ids
   */
  require(id: string): GradingStandard {
    const standard = this.standards.get(id);
    if (!standard) {
      throw new GradingStandardNotFoundError(id, this.ids());
    }
    return standard;
  }

  ids(): string[] {
    return [...this.standards.keys()];
  }

  list(): GradingStandardInfo[] {
    return [...this.standards.entries()].map(([id, standard]) => ({
      id,
      name: standard.name,
      description: standard.description,
    }));
  }

  /**
   * Switch the active standard. Unknown ids leave the active id unchanged.
   */
  setActive(id: string): boolean {
    if (!this.standards.has(id)) {
      return false;
    }
    this.activeStandardId = id;
    return true;
  }

  activeId(): string | null {
    return this.activeStandardId;
  }

  /**
   * @throws GradingStandardNotFoundError when the registry is empty
   */
  active(): GradingStandard {
    if (this.activeStandardId === null) {
      throw new GradingStandardNotFoundError('(active)', []);
    }
    return this.require(this.activeStandardId);
  }
}
