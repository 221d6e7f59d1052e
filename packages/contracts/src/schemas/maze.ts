import { z } from "zod";
import { MAX_AREA, MAX_DIMENSION, MIN_DIMENSION } from "../constants";
import { GENERATOR_NAMES, PATHFINDER_NAMES } from "../types/maze";
import { SeedSchema } from "./seed";

const DimensionSchema = (label: string) =>
  z
    .number()
    .int({ error: `${label} must be an integer` })
    .min(MIN_DIMENSION, {
      error: `${label} must be at least ${MIN_DIMENSION}`,
    })
    .max(MAX_DIMENSION, {
      error: `${label} cannot exceed ${MAX_DIMENSION}`,
    });

export const MazeConfigSchema = z
  .object({
    width: DimensionSchema("Width"),
    height: DimensionSchema("Height"),
    generator: z.enum(GENERATOR_NAMES),
    pathfinder: z.enum(PATHFINDER_NAMES),
    seed: SeedSchema.optional(),
  })
  .superRefine((data, ctx) => {
    const area = data.width * data.height;
    if (area > MAX_AREA) {
      ctx.addIssue({
        code: "custom",
        message: `Maze area cannot exceed ${MAX_AREA} cells (current: ${area})`,
        path: ["width"],
      });
    }
  });

export type ValidatedMazeConfig = z.infer<typeof MazeConfigSchema>;

const PositionRecordSchema = z.object({
  x: z.number().int().min(0),
  y: z.number().int().min(0),
});

/**
 * Single-character codes of an exported grid.
 */
export const CellCodeSchema = z.enum(["#", " ", "S", "E", "."]);

export const MazeRecordSchema = z
  .object({
    width: z.number().int().min(1),
    height: z.number().int().min(1),
    start: PositionRecordSchema,
    end: PositionRecordSchema,
    grid: z.array(z.array(CellCodeSchema)),
    solutionPath: z.array(PositionRecordSchema).nullable(),
  })
  .superRefine((data, ctx) => {
    if (data.grid.length !== data.height) {
      ctx.addIssue({
        code: "custom",
        message: `Expected ${data.height} rows, found ${data.grid.length}`,
        path: ["grid"],
      });
      return;
    }
    data.grid.forEach((row, y) => {
      if (row.length !== data.width) {
        ctx.addIssue({
          code: "custom",
          message: `Row ${y} has ${row.length} cells, expected ${data.width}`,
          path: ["grid", y],
        });
      }
    });
    for (const key of ["start", "end"] as const) {
      const p = data[key];
      if (p.x >= data.width || p.y >= data.height) {
        ctx.addIssue({
          code: "custom",
          message: `${key} (${p.x}, ${p.y}) lies outside the grid`,
          path: [key],
        });
      }
    }
  });
