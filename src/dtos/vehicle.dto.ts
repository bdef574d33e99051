import { InvalidVehicleTagError } from "../errors";
import { RESERVED_SYMBOLS } from "./bay.dto";

// One character shown in the bay while the vehicle is parked.
export type VehicleTag = string;

export const DISABLED_VEHICLE_TAG: VehicleTag = 'D';

export function isDisabledVehicle(tag: VehicleTag): boolean {
  return tag === DISABLED_VEHICLE_TAG;
}

export function assertVehicleTag(tag: VehicleTag): void {
  if (tag.length !== 1) throw new InvalidVehicleTagError(tag);
  if (isDisabledVehicle(tag)) return;
  if (RESERVED_SYMBOLS.includes(tag)) throw new InvalidVehicleTagError(tag);
}
