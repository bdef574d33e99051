import { VehicleTag } from "../dtos/vehicle.dto";

export interface IBayAllocator {
  /** @returns the index of the bay taken, or null when no bay fits */
  park(tag: VehicleTag): number | null;
  /** @returns false when the bay held no vehicle */
  unpark(index: number): boolean;
}
