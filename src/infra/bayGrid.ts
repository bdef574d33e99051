import { Bay, BayStatus, bayToSymbol, isTaken } from "../dtos/bay.dto";
import { ParkingLayout, parseLayout } from "../dtos/layout.dto";
import { IllegalBayTransitionError, InvalidBayIndexError } from "../errors";

const DISABLED_STATES: readonly BayStatus[] = ['DISABLED_FREE', 'DISABLED_TAKEN'];

// row-major bay states; only the allocator calls place()
export class BayGrid {
  readonly laneSize: number;
  readonly total: number;
  readonly pedestrianExits: readonly number[];

  private readonly bays: Bay[];
  private readonly exitSet: ReadonlySet<number>;
  private readonly disabledSet: ReadonlySet<number>;
  private parked = 0;

  constructor(layout: ParkingLayout) {
    const { laneSize, pedestrianExits, disabledBays } = parseLayout(layout);
    this.laneSize = laneSize;
    this.total = laneSize * laneSize;
    this.pedestrianExits = pedestrianExits.slice();
    this.exitSet = new Set(pedestrianExits);
    this.disabledSet = new Set(disabledBays);

    this.bays = Array.from({ length: this.total }, (_, i): Bay => {
      if (this.exitSet.has(i)) return { status: 'PEDESTRIAN_EXIT' };
      if (this.disabledSet.has(i)) return { status: 'DISABLED_FREE' };
      return { status: 'FREE' };
    });
  }

  get parkedCars(): number {
    return this.parked;
  }

  // Free disabled bays count as available whatever the vehicle asking.
  availableBays(): number {
    return this.total - this.pedestrianExits.length - this.parked;
  }

  contains(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.total;
  }

  bayAt(index: number): Bay {
    if (!this.contains(index)) throw new InvalidBayIndexError(index, this.total);
    return this.bays[index];
  }

  isPedestrianExit(index: number): boolean {
    return this.exitSet.has(index);
  }

  isDisabledBay(index: number): boolean {
    return this.disabledSet.has(index);
  }

  place(index: number, bay: Bay): void {
    const previous = this.bayAt(index);
    if (this.isPedestrianExit(index)) {
      throw new IllegalBayTransitionError(`Bay ${index} is a pedestrian exit`);
    }
    const disabledState = DISABLED_STATES.includes(bay.status);
    if (disabledState !== this.isDisabledBay(index) || bay.status === 'PEDESTRIAN_EXIT') {
      throw new IllegalBayTransitionError(`Bay ${index} cannot become ${bay.status}`);
    }

    if (isTaken(previous)) this.parked--;
    if (isTaken(bay)) this.parked++;
    this.bays[index] = bay;
  }

  snapshot(): string[] {
    return this.bays.map(bayToSymbol);
  }
}
