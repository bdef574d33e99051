import { ParkingService } from "./parkingService";

export class ParkingBuilder {
  private laneSize = 0;
  private pedestrianExits: number[] = [];
  private disabledBays: number[] = [];

  withSquareSize(laneSize: number): this {
    this.laneSize = laneSize;
    return this;
  }

  withPedestrianExit(index: number): this {
    this.pedestrianExits.push(index);
    return this;
  }

  withDisabledBay(index: number): this {
    this.disabledBays.push(index);
    return this;
  }

  // throws ConfigurationError when the layout does not fit the square
  build(): ParkingService {
    return ParkingService.fromLayout({
      laneSize: this.laneSize,
      pedestrianExits: this.pedestrianExits.slice(),
      disabledBays: this.disabledBays.slice(),
    });
  }
}
