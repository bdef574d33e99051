import { z } from 'zod';
import { ConfigurationError } from "../errors";

const bayIndex = z.number().int({ message: 'bay indices must be integers' });

export const ParkingLayoutSchema = z.object({
  laneSize: z.number().int().positive({ message: 'laneSize must be a positive integer' }),
  pedestrianExits: z.array(bayIndex),
  disabledBays: z.array(bayIndex),
}).superRefine((layout, ctx) => {
  if (!Number.isInteger(layout.laneSize) || layout.laneSize < 1) return;
  const total = layout.laneSize * layout.laneSize;
  const report = (message: string) => ctx.addIssue({ code: z.ZodIssueCode.custom, message });

  const exits = new Set<number>();
  for (const exit of layout.pedestrianExits) {
    if (exit < 0 || exit >= total) report(`pedestrian exit ${exit} is outside the grid [0, ${total})`);
    if (exits.has(exit)) report(`pedestrian exit ${exit} is listed more than once`);
    exits.add(exit);
  }

  const disabled = new Set<number>();
  for (const bay of layout.disabledBays) {
    if (bay < 0 || bay >= total) report(`disabled bay ${bay} is outside the grid [0, ${total})`);
    if (disabled.has(bay)) report(`disabled bay ${bay} is listed more than once`);
    if (exits.has(bay)) report(`bay ${bay} is listed as both a pedestrian exit and a disabled bay`);
    disabled.add(bay);
  }
});

export type ParkingLayout = z.infer<typeof ParkingLayoutSchema>;

export function parseLayout(layout: ParkingLayout): ParkingLayout {
  const result = ParkingLayoutSchema.safeParse(layout);
  if (!result.success) {
    const issues = result.error.issues.map(issue => issue.message).join('; ');
    throw new ConfigurationError(`Invalid parking layout: ${issues}`);
  }
  return result.data;
}
