/**
 * Builtin grading standards and the default registry
 */

import type { GradingStandard } from '../core/types/grading.js';
import { BUILTIN_STANDARDS_DIR } from '../core/data-files.js';
import { DEFAULT_STANDARD_ID } from '../core/constants.js';
import { logger } from '../core/utils/logger.js';
import { GradingStandardRegistry } from './registry.js';
import { loadStandardsFromDirectory } from './standard-loader.js';

let builtinCache: readonly GradingStandard[] | null = null;

/**
 * Standards shipped in data/standards. Loaded once per process; standards
 * are immutable so the cache is shared.
 */
export function loadBuiltinStandards(): readonly GradingStandard[] {
  if (!builtinCache) {
    builtinCache = Object.freeze(loadStandardsFromDirectory(BUILTIN_STANDARDS_DIR));
  }
  return builtinCache;
}

export interface DefaultRegistryOptions {
  /** Extra directories whose standards are registered after the builtins */
  readonly standardsDirs?: readonly string[];
  /** Standard to activate; defaults to jiangsu */
  readonly activeId?: string;
}

/**
 * Registry seeded with the builtin standards plus any configured directories.
 * A standard in a later directory replaces a builtin with the same id.
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): GradingStandardRegistry {
  const registry = new GradingStandardRegistry();
  for (const standard of loadBuiltinStandards()) {
    registry.register(standard.id, standard);
  }
  for (const dir of options.standardsDirs ?? []) {
    for (const standard of loadStandardsFromDirectory(dir)) {
      if (registry.has(standard.id)) {
        logger.warn('Grading standard replaced by configured file', { id: standard.id, dir });
      }
      registry.register(standard.id, standard);
    }
  }

  const activeId = options.activeId ?? DEFAULT_STANDARD_ID;
  if (!registry.setActive(activeId)) {
    logger.warn('Configured active standard is not registered', {
      activeId,
      available: registry.ids(),
    });
  }
  return registry;
}
