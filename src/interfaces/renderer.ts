import { BayGrid } from "../infra/bayGrid";

export interface IGridRenderer {
  render(grid: BayGrid): string;
}
