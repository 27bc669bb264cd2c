import type { Coord, Occurrence, ScheduleRule } from '../models';
import type { RecurrenceHorizon } from '../lib/calendar';
import { DEFAULT_HORIZON, activeWindow, nextOccurrences } from '../lib/calendar';
import { DEFAULT_TIMEZONE } from '../lib/timezone';
import { loadScheduleTable } from './records';
import type { NearbyMatch, ResolvedMatch } from './resolver';
import { DEFAULT_NEARBY_DISTANCE_METERS, MAX_MATCH_RADIUS_METERS, resolve, resolveNearby } from './resolver';
import { DEFAULT_SEARCH_RADIUS_CELLS, SpatialGrid } from './spatial-index';

export { MAX_MATCH_RADIUS_METERS } from './resolver';
export type { NearbyMatch, ResolvedMatch } from './resolver';

export type CatalogStatus = 'loading' | 'ready' | 'unavailable';

export const NEARBY_SEARCH_RADIUS_CELLS = 10;

export interface CatalogOptions {
  timeZone?: string;
  maxMatchRadiusMeters?: number;
  horizon?: RecurrenceHorizon;
}

export interface NearbyOptions {
  radiusCells?: number;
  maxDistanceMeters?: number;
  now?: Date;
}

/**
 * Owns the loaded schedule rules and their spatial index.
 *
 * Rules are loaded once; until then (or when loading failed) every query answers
 * as if there were no restriction anywhere.
 */
export class ScheduleCatalog {
  readonly timeZone: string;
  readonly maxMatchRadiusMeters: number;
  readonly horizon: RecurrenceHorizon;

  private state: CatalogStatus = 'loading';
  private failure: string | null = null;
  private rules: readonly ScheduleRule[] = [];
  private byId = new Map<string, ScheduleRule>();
  private grid = new SpatialGrid();

  constructor(options: CatalogOptions = {}) {
    this.timeZone = options.timeZone ?? DEFAULT_TIMEZONE;
    this.maxMatchRadiusMeters = options.maxMatchRadiusMeters ?? MAX_MATCH_RADIUS_METERS;
    this.horizon = options.horizon ?? DEFAULT_HORIZON;
  }

  static fromRules(rules: readonly ScheduleRule[], options: CatalogOptions = {}): ScheduleCatalog {
    const catalog = new ScheduleCatalog(options);
    catalog.install(rules);
    return catalog;
  }

  get status(): CatalogStatus {
    return this.state;
  }

  get unavailableReason(): string | null {
    return this.failure;
  }

  get size(): number {
    return this.rules.length;
  }

  async load(path: string): Promise<CatalogStatus> {
    if (this.state !== 'loading') {
      return this.state;
    }

    const result = await loadScheduleTable(path);
    if (result.status === 'ready') {
      this.install(result.rules);
    } else {
      this.state = 'unavailable';
      this.failure = result.reason;
    }
    return this.state;
  }

  private install(rules: readonly ScheduleRule[]): void {
    const byId = new Map<string, ScheduleRule>();
    for (const rule of rules) {
      if (byId.has(rule.id)) {
        console.log('Duplicate schedule id, keeping first', { id: rule.id });
        continue;
      }
      byId.set(rule.id, rule);
    }
    this.rules = Object.freeze([...byId.values()]);
    this.byId = byId;
    this.grid = new SpatialGrid(this.rules);
    this.state = 'ready';
    this.failure = null;
  }

  getRule(id: string): ScheduleRule | null {
    return this.byId.get(id) ?? null;
  }

  candidatesNear(point: Coord, radiusCells = DEFAULT_SEARCH_RADIUS_CELLS): ScheduleRule[] {
    return this.grid.candidatesNear(point, radiusCells);
  }

  resolve(point: Coord, now: Date = new Date()): ResolvedMatch | null {
    return resolve(point, this.candidatesNear(point), {
      maxDistanceMeters: this.maxMatchRadiusMeters,
      now,
      timeZone: this.timeZone,
      horizon: this.horizon,
    });
  }

  nearby(point: Coord, options: NearbyOptions = {}): NearbyMatch[] {
    const candidates = this.candidatesNear(point, options.radiusCells ?? NEARBY_SEARCH_RADIUS_CELLS);
    return resolveNearby(point, candidates, {
      maxDistanceMeters: options.maxDistanceMeters ?? DEFAULT_NEARBY_DISTANCE_METERS,
      now: options.now,
      timeZone: this.timeZone,
      horizon: this.horizon,
    });
  }

  occurrences(rule: ScheduleRule, after: Date, options: { horizon?: RecurrenceHorizon; limit?: number } = {}): Occurrence[] {
    return nextOccurrences(rule, after, {
      horizon: options.horizon ?? this.horizon,
      limit: options.limit,
      timeZone: this.timeZone,
    });
  }

  activeWindow(rule: ScheduleRule, at: Date): Occurrence | null {
    return activeWindow(rule, at, { timeZone: this.timeZone });
  }
}
