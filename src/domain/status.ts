import { UNIT_STATUSES, type UnitStatus } from './types.js';

export function statusRank(status: UnitStatus): number {
  return UNIT_STATUSES.indexOf(status);
}

export function isAtLeast(status: UnitStatus, floor: UnitStatus): boolean {
  return statusRank(status) >= statusRank(floor);
}

/**
 * Status only moves forward. A resume may re-enter an earlier stage, but
 * only when the caller says so.
 */
export function advanceStatus(
  current: UnitStatus,
  next: UnitStatus,
  opts: { reentry?: boolean } = {},
): UnitStatus {
  if (statusRank(next) < statusRank(current) && !opts.reentry) {
    throw new Error(`Cannot move status backwards from ${current} to ${next}`);
  }
  return next;
}
