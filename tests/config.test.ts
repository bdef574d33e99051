import { loadConfig } from "../src/config";
import { ConfigurationError } from "../src/errors";

test('falls back to the default layout', () => {
  expect(loadConfig({})).toEqual({ laneSize: 5, pedestrianExits: [8, 12], disabledBays: [5, 10] });
});

test('reads lane size and index lists from the environment', () => {
  const layout = loadConfig({
    PARKING_LANE_SIZE: '3',
    PARKING_PEDESTRIAN_EXITS: ' 1, 7 ',
    PARKING_DISABLED_BAYS: '',
  });
  expect(layout).toEqual({ laneSize: 3, pedestrianExits: [1, 7], disabledBays: [] });
});

test('rejects malformed values', () => {
  expect(() => loadConfig({ PARKING_LANE_SIZE: 'zero' })).toThrow(ConfigurationError);
  expect(() => loadConfig({ PARKING_PEDESTRIAN_EXITS: '1,x' }))
    .toThrow('Invalid environment: PARKING_PEDESTRIAN_EXITS: "x" is not a bay index');
});
