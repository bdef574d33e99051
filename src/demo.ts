import { loadConfig } from "./config";
import { ParkingService } from "./services/parkingService";

function demo() {
  const parking = ParkingService.fromLayout(loadConfig());
  console.log(`Available bays: ${parking.availableBays()}`);

  const parked: number[] = [];
  for (const tag of ['A', 'B', 'D', 'C']) {
    const index = parking.park(tag);
    console.log(index === null ? `No bay found for ${tag}` : `Parked ${tag} at bay ${index}`);
    if (index !== null) parked.push(index);
  }
  process.stdout.write(parking.render());

  const [first] = parked;
  if (first !== undefined) console.log(`Unparked bay ${first}:`, parking.unpark(first));
  console.log(`Available bays: ${parking.availableBays()}`);
  process.stdout.write(parking.render());
}

try {
  demo();
} catch (err) {
  console.error(err);
  process.exitCode = 1;
}
