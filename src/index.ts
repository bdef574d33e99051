export { ParkingService } from "./services/parkingService";
export { ParkingBuilder } from "./services/parkingBuilder";
export { NearestExitAllocator, ringSearch, SearchStep } from "./services/nearestExitAllocator";
export { LaneRenderer, laneOrder } from "./services/laneRenderer";
export { BayGrid } from "./infra/bayGrid";
export { Bay, BayStatus, BAY_SYMBOLS, RESERVED_SYMBOLS, bayToSymbol } from "./dtos/bay.dto";
export { ParkingLayout, ParkingLayoutSchema, parseLayout } from "./dtos/layout.dto";
export { VehicleTag, DISABLED_VEHICLE_TAG } from "./dtos/vehicle.dto";
export { IBayAllocator } from "./interfaces/allocator";
export { IGridRenderer } from "./interfaces/renderer";
export { loadConfig } from "./config";
export * from "./errors";
