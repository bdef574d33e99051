import { IBayAllocator } from "../interfaces/allocator";
import { BayGrid } from "../infra/bayGrid";
import { VehicleTag, assertVehicleTag, isDisabledVehicle } from "../dtos/vehicle.dto";

export type SearchStep = {
  kind: 'ENTRANCE' | 'LEFT' | 'RIGHT';
  exit: number;
  index: number;
};

// rings around each exit, left before right; an exit at 0 offers bay 1 first
export function* ringSearch(grid: BayGrid): Generator<SearchStep> {
  for (let radius = 1; ; radius++) {
    let reachable = false;
    for (const exit of grid.pedestrianExits) {
      if (exit === 0 && grid.contains(1)) yield { kind: 'ENTRANCE', exit, index: 1 };

      const left = exit - radius;
      const right = exit + radius;
      if (grid.contains(left)) {
        reachable = true;
        yield { kind: 'LEFT', exit, index: left };
      }
      if (grid.contains(right)) {
        reachable = true;
        yield { kind: 'RIGHT', exit, index: right };
      }
    }
    if (!reachable) return;
  }
}

export class NearestExitAllocator implements IBayAllocator {
  constructor(private grid: BayGrid) {}

  park(tag: VehicleTag): number | null {
    assertVehicleTag(tag);
    if (this.grid.availableBays() === 0) return null;

    const disabled = isDisabledVehicle(tag);
    for (const step of ringSearch(this.grid)) {
      const bay = this.grid.bayAt(step.index);
      // entrance bay takes any vehicle, a disabled one included
      if (step.kind === 'ENTRANCE') {
        if (bay.status !== 'FREE') continue;
        this.grid.place(step.index, { status: 'OCCUPIED', tag });
        return step.index;
      }
      if (disabled && bay.status === 'DISABLED_FREE') {
        this.grid.place(step.index, { status: 'DISABLED_TAKEN' });
        return step.index;
      }
      if (!disabled && bay.status === 'FREE') {
        this.grid.place(step.index, { status: 'OCCUPIED', tag });
        return step.index;
      }
    }
    return null;
  }

  unpark(index: number): boolean {
    const bay = this.grid.bayAt(index);
    switch (bay.status) {
      case 'DISABLED_TAKEN':
        this.grid.place(index, { status: 'DISABLED_FREE' });
        return true;
      case 'OCCUPIED':
        this.grid.place(index, { status: 'FREE' });
        return true;
      default:
        return false;
    }
  }
}
