import { IGridRenderer } from "../interfaces/renderer";
import { BayGrid } from "../infra/bayGrid";
import { bayToSymbol } from "../dtos/bay.dto";

// odd lanes run backwards: cars U-turn at the end of each lane
export function laneOrder(laneSize: number): number[][] {
  const lanes: number[][] = [];
  for (let row = 0; row < laneSize; row++) {
    const start = row * laneSize;
    const lane = Array.from({ length: laneSize }, (_, column) => start + column);
    lanes.push(row % 2 === 0 ? lane : lane.reverse());
  }
  return lanes;
}

export class LaneRenderer implements IGridRenderer {
  render(grid: BayGrid): string {
    return laneOrder(grid.laneSize)
      .map(lane => lane.map(index => bayToSymbol(grid.bayAt(index))).join('') + '\n')
      .join('');
  }
}
