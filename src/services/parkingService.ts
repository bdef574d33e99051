import { BayGrid } from "../infra/bayGrid";
import { NearestExitAllocator } from "./nearestExitAllocator";
import { LaneRenderer } from "./laneRenderer";
import { IBayAllocator } from "../interfaces/allocator";
import { IGridRenderer } from "../interfaces/renderer";
import { ParkingLayout } from "../dtos/layout.dto";
import { VehicleTag } from "../dtos/vehicle.dto";

export class ParkingService {
  private allocator: IBayAllocator;
  constructor(private grid: BayGrid, private renderer: IGridRenderer = new LaneRenderer()) {
    this.allocator = new NearestExitAllocator(grid);
  }

  static fromLayout(layout: ParkingLayout): ParkingService {
    return new ParkingService(new BayGrid(layout));
  }

  availableBays(): number {
    return this.grid.availableBays();
  }

  // 'D' takes disabled bays, other tags general ones; null when nothing fits
  park(tag: VehicleTag): number | null {
    return this.allocator.park(tag);
  }

  unpark(index: number): boolean {
    return this.allocator.unpark(index);
  }

  render(): string {
    return this.renderer.render(this.grid);
  }

  toString(): string {
    return this.render();
  }
}
