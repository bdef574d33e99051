import { z } from 'zod';
import { ConfigurationError } from "./errors";
import { ParkingLayout } from "./dtos/layout.dto";

// "8, 12" -> [8, 12]; "" -> []
const indexList = z.string().transform((raw, ctx) => {
  if (raw.trim() === '') return [];
  const indices: number[] = [];
  for (const part of raw.split(',')) {
    const value = Number(part.trim());
    if (part.trim() === '' || !Number.isInteger(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${part.trim()}" is not a bay index` });
      return z.NEVER;
    }
    indices.push(value);
  }
  return indices;
});

const EnvSchema = z.object({
  PARKING_LANE_SIZE: z.coerce.number().int().positive().default(5),
  PARKING_PEDESTRIAN_EXITS: indexList.default('8,12'),
  PARKING_DISABLED_BAYS: indexList.default('5,10'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ParkingLayout {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  return {
    laneSize: result.data.PARKING_LANE_SIZE,
    pedestrianExits: result.data.PARKING_PEDESTRIAN_EXITS,
    disabledBays: result.data.PARKING_DISABLED_BAYS,
  };
}
