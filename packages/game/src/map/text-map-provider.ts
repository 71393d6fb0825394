/**
 * Text Map Provider
 *
 * Builds map descriptors from a character grid. Meant for tests and
 * examples, not generation.
 *
 * @example
 * const provider = new TextMapProvider([
 *   "#####",
 *   "#@.~#",
 *   "#####",
 * ]);
 */

import type { MapCell, MapDescriptor, Point } from "@delve/contracts";
import type { MapProvider } from "./game-map";

export interface LegendEntry extends MapCell {
  readonly spawn?: boolean;
}

export const DEFAULT_LEGEND: Readonly<Record<string, LegendEntry>> = {
  "#": { passable: false, moveCost: 0 },
  ".": { passable: true, moveCost: 1 },
  ",": { passable: true, moveCost: 2 },
  "~": { passable: true, moveCost: 3 },
  "@": { passable: true, moveCost: 1, spawn: true },
  S: { passable: true, moveCost: 1, spawn: true },
};

export class TextMapProvider implements MapProvider {
  private readonly rows: readonly string[];

  constructor(
    rows: readonly string[] | string,
    private readonly legend: Readonly<Record<string, LegendEntry>> = DEFAULT_LEGEND,
  ) {
    this.rows = typeof rows === "string" ? parseRows(rows) : rows;
  }

  /**
   * The grid is fixed, so the seed is ignored.
   */
  generate(_seed: number): MapDescriptor {
    const height = this.rows.length;
    const width = this.rows.reduce((w, row) => Math.max(w, row.length), 0);
    const cells: MapCell[] = [];
    const spawnPoints: Point[] = [];

    for (let y = 0; y < height; y++) {
      const row = this.rows[y];
      for (let x = 0; x < width; x++) {
        // Short rows are padded with walls
        const glyph = row[x] ?? "#";
        const entry = this.legend[glyph];
        if (entry === undefined) {
          throw new Error(`Unknown map glyph "${glyph}" at (${x},${y})`);
        }
        cells.push({ passable: entry.passable, moveCost: entry.moveCost });
        if (entry.spawn) spawnPoints.push({ x, y });
      }
    }

    return { width, height, cells, spawnPoints };
  }
}

function parseRows(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
}
