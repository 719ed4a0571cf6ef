/**
 * Attribute land filters
 *
 * Some attributes are only evaluated on part of the land:
 * - cultivated_and_garden: 耕地 and 园地
 * - paddy_only: 水田
 * - cultivated_only: 耕地
 */

import type { LandFilter } from '../core/types/grading.js';
import type { LandUseClass } from '../core/types/observation.js';

export function landFilterAccepts(filter: LandFilter, landUse: LandUseClass): boolean {
  switch (filter) {
    case 'none':
      return true;
    case 'cultivated_and_garden':
      return landUse.primary === 'cultivated' || landUse.primary === 'garden';
    case 'paddy_only':
      return landUse.primary === 'cultivated' && landUse.secondary === 'paddy_field';
    case 'cultivated_only':
      return landUse.primary === 'cultivated';
  }
}
