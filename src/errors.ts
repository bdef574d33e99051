export class ParkingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends ParkingError {}

export class InvalidBayIndexError extends ParkingError {
  constructor(readonly index: number, total: number) {
    super(`Bay index ${index} is outside the grid [0, ${total})`);
  }
}

export class InvalidVehicleTagError extends ParkingError {
  constructor(readonly tag: string) {
    super(`"${tag}" cannot be used as a vehicle tag`);
  }
}

export class IllegalBayTransitionError extends ParkingError {}
