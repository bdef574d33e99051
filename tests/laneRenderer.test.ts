import { BayGrid } from "../src/infra/bayGrid";
import { LaneRenderer, laneOrder } from "../src/services/laneRenderer";
import { NearestExitAllocator } from "../src/services/nearestExitAllocator";

test('reverses every odd lane', () => {
  expect(laneOrder(3)).toEqual([[0, 1, 2], [5, 4, 3], [6, 7, 8]]);
  expect(laneOrder(1)).toEqual([[0]]);
});

test.each([1, 2, 3, 4, 5, 6, 7])('covers every bay exactly once for lane size %i', laneSize => {
  const lanes = laneOrder(laneSize);
  expect(lanes).toHaveLength(laneSize);
  for (const lane of lanes) expect(lane).toHaveLength(laneSize);

  const indices = lanes.flat().sort((a, b) => a - b);
  expect(indices).toEqual(Array.from({ length: laneSize * laneSize }, (_, i) => i));
});

test('renders one line per lane with the bay symbols', () => {
  const grid = new BayGrid({ laneSize: 5, pedestrianExits: [8], disabledBays: [5, 10] });
  const allocator = new NearestExitAllocator(grid);
  for (const tag of ['A', 'B', 'C', 'E', 'D', 'D']) allocator.park(tag);

  expect(new LaneRenderer().render(grid)).toBe(
    'UUUUU\n' +
    'B=ACD\n' +
    'DEUUU\n' +
    'UUUUU\n' +
    'UUUUU\n'
  );
});

test('renders a single bay grid', () => {
  const grid = new BayGrid({ laneSize: 1, pedestrianExits: [0], disabledBays: [] });
  expect(new LaneRenderer().render(grid)).toBe('=\n');
});
