export type Bay =
  | { status: 'PEDESTRIAN_EXIT' }
  | { status: 'DISABLED_FREE' }
  | { status: 'DISABLED_TAKEN' }
  | { status: 'FREE' }
  | { status: 'OCCUPIED'; tag: string };

export type BayStatus = Bay['status'];

export const BAY_SYMBOLS = {
  PEDESTRIAN_EXIT: '=',
  DISABLED_FREE: '@',
  DISABLED_TAKEN: 'D',
  FREE: 'U',
} as const;

export const RESERVED_SYMBOLS: readonly string[] = Object.values(BAY_SYMBOLS);

export function bayToSymbol(bay: Bay): string {
  return bay.status === 'OCCUPIED' ? bay.tag : BAY_SYMBOLS[bay.status];
}

// Counted in parkedCars.
export function isTaken(bay: Bay): boolean {
  return bay.status === 'OCCUPIED' || bay.status === 'DISABLED_TAKEN';
}
