// services/TimeAccounting/utils/DirectionNormalizers.ts

import { Direction, ResolvedDirection } from '../../../types/access';

export class DirectionNormalizers {
  /**
   * Maps the direction labels found in access-control exports to a
   * Direction. Returns null for a label that is not recognised.
   */
  static normalizeDirection(
    value: Direction | string | null | undefined,
  ): Direction | null {
    if (value === null || value === undefined) return Direction.UNKNOWN;

    const normalized = value.trim().toUpperCase().replace(/[-\s]/g, '_');
    switch (normalized) {
      case 'ENTRY':
      case 'ENTRADA':
      case 'IN':
      case 'CHECK_IN':
        return Direction.ENTRY;
      case 'EXIT':
      case 'SALIDA':
      case 'OUT':
      case 'CHECK_OUT':
        return Direction.EXIT;
      case '':
      case 'UNKNOWN':
      case 'DESCONOCIDO':
        return Direction.UNKNOWN;
      default:
        return null;
    }
  }

  static opposite(direction: ResolvedDirection): ResolvedDirection {
    return direction === Direction.ENTRY ? Direction.EXIT : Direction.ENTRY;
  }

  /**
   * Order of events sharing an instant: the direction that closes or opens
   * the pending state goes first, unknown last.
   */
  static tieWeight(direction: Direction, entryPending: boolean): number {
    switch (direction) {
      case Direction.ENTRY:
        return entryPending ? 1 : 0;
      case Direction.EXIT:
        return entryPending ? 0 : 1;
      default:
        return 2;
    }
  }
}
