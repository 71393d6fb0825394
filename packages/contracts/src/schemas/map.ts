import { z } from "zod";

export const MapCellSchema = z.object({
  passable: z.boolean(),
  moveCost: z
    .number()
    .min(0, { error: "Move cost must be non-negative" })
    .refine(Number.isFinite, { message: "Move cost must be finite" }),
});

export const MapPointSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

/**
 * What a map provider hands to the core: a row-major grid of cells and the
 * coordinates entities may spawn on.
 */
export const MapDescriptorSchema = z
  .object({
    width: z.number().int().min(1).max(0xffff),
    height: z.number().int().min(1).max(0xffff),
    cells: z.array(MapCellSchema),
    spawnPoints: z.array(MapPointSchema),
  })
  .superRefine((map, ctx) => {
    if (map.cells.length !== map.width * map.height) {
      ctx.addIssue({
        code: "custom",
        message: `Expected ${map.width * map.height} cells, got ${map.cells.length}`,
        path: ["cells"],
      });
      return;
    }
    map.spawnPoints.forEach((p, i) => {
      const inBounds = p.x >= 0 && p.y >= 0 && p.x < map.width && p.y < map.height;
      if (!inBounds) {
        ctx.addIssue({
          code: "custom",
          message: `Spawn point (${p.x},${p.y}) is out of bounds`,
          path: ["spawnPoints", i],
        });
        return;
      }
      if (!map.cells[p.y * map.width + p.x]?.passable) {
        ctx.addIssue({
          code: "custom",
          message: `Spawn point (${p.x},${p.y}) is not passable`,
          path: ["spawnPoints", i],
        });
      }
    });
  });

export type MapCell = z.infer<typeof MapCellSchema>;
export type MapDescriptor = z.infer<typeof MapDescriptorSchema>;
