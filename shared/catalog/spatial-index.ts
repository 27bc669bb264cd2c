import type { Coord, ScheduleRule } from '../models';

export const CELL_SIZE_DEGREES = 0.001;  // ~100m at city latitudes
export const DEFAULT_SEARCH_RADIUS_CELLS = 2;

function cellIndex(value: number): number {
  return Math.floor(value / CELL_SIZE_DEGREES);
}

function cellKey(x: number, y: number): string {
  return `${x}:${y}`;
}

/**
 * Uniform grid over rule geometry for candidate lookup.
 *
 * A rule is registered in every cell that holds one of its vertices. Segments
 * that pass through a cell without a vertex in it are not registered there, so a
 * long straight block is only found from near its ends or interior vertices; the
 * search radius covers that for city-block lengths.
 */
export class SpatialGrid {
  private readonly cells = new Map<string, ScheduleRule[]>();

  constructor(rules: readonly ScheduleRule[] = []) {
    for (const rule of rules) {
      this.insert(rule);
    }
  }

  get cellCount(): number {
    return this.cells.size;
  }

  insert(rule: ScheduleRule): void {
    const seen = new Set<string>();
    for (const [lon, lat] of rule.line) {
      const key = cellKey(cellIndex(lon), cellIndex(lat));
      if (seen.has(key)) continue;
      seen.add(key);

      const bucket = this.cells.get(key);
      if (bucket) {
        bucket.push(rule);
      } else {
        this.cells.set(key, [rule]);
      }
    }
  }

  /**
   * Rules registered in the (2r+1)x(2r+1) block of cells around `point`,
   * deduplicated by id in first-seen order.
   */
  candidatesNear([lon, lat]: Coord, radiusCells = DEFAULT_SEARCH_RADIUS_CELLS): ScheduleRule[] {
    const radius = Math.max(0, Math.floor(radiusCells));
    const cx = cellIndex(lon);
    const cy = cellIndex(lat);
    const seen = new Set<string>();
    const out: ScheduleRule[] = [];

    for (let dx = -radius; dx <= radius; dx++) {
      for (let dy = -radius; dy <= radius; dy++) {
        const bucket = this.cells.get(cellKey(cx + dx, cy + dy));
        if (!bucket) continue;
        for (const rule of bucket) {
          if (seen.has(rule.id)) continue;
          seen.add(rule.id);
          out.push(rule);
        }
      }
    }

    return out;
  }
}
