import { z } from "zod";
import {
  MIN_MAZE_SIZE,
  PATHFINDER_ALGORITHMS,
  type Position,
} from "../types/maze";

const CoordinateSchema = z
  .number()
  .int({ error: "Coordinates must be integers" })
  .min(0, { error: "Coordinates must be non-negative" });

export const PositionSchema = z.tuple([CoordinateSchema, CoordinateSchema]);

export const MazeConfigSchema = z
  .object({
    size: z
      .number()
      .int({ error: "Size must be an integer" })
      .min(MIN_MAZE_SIZE, { error: `size must be at least ${MIN_MAZE_SIZE}` }),
    seed: z.number().int({ error: "Seed must be an integer" }),
    start: PositionSchema,
    goal: PositionSchema.optional(),
    minValidPaths: z
      .number()
      .int({ error: "minValidPaths must be an integer" })
      .min(1, { error: "minValidPaths must be at least 1" })
      .default(3),
    algorithm: z.enum(PATHFINDER_ALGORITHMS).default("bfs"),
  })
  .superRefine((data, ctx) => {
    const endpoints = [
      ["start", data.start],
      ["goal", data.goal],
    ] as const;
    for (const [key, position] of endpoints) {
      if (position === undefined) continue;
      if (position[0] >= data.size || position[1] >= data.size) {
        ctx.addIssue({
          code: "custom",
          message: `${key} (${position[0]}, ${position[1]}) is outside a ${data.size}x${data.size} maze`,
          path: [key],
        });
      }
    }
  })
  .transform((data) => {
    const goal: Position = data.goal ?? [data.size - 2, data.size - 2];
    return { ...data, goal };
  });

export type MazeConfigInput = z.input<typeof MazeConfigSchema>;
export type ValidatedMazeConfig = z.output<typeof MazeConfigSchema>;
