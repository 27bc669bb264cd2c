import type { Coord, Occurrence, ScheduleRule, StreetSide } from '../models';
import type { RecurrenceHorizon } from '../lib/calendar';
import { nextOccurrence } from '../lib/calendar';
import type { LineProjection } from '../lib/geometry';
import { METERS_PER_FOOT, blockSideMatches, classifySide, closestPointOnLine } from '../lib/geometry';

export const MAX_MATCH_RADIUS_FEET = 50;
export const MAX_MATCH_RADIUS_METERS = MAX_MATCH_RADIUS_FEET * METERS_PER_FOOT;
export const DEFAULT_NEARBY_DISTANCE_METERS = 150;

export interface ResolvedMatch {
  rule: ScheduleRule;
  side: StreetSide;
  distanceMeters: number;
  nextOccurrence: Occurrence | null;
}

export interface NearbyMatch extends ResolvedMatch {
  isUserSide: boolean;
}

export interface ResolveOptions {
  maxDistanceMeters?: number;
  now?: Date;
  timeZone?: string;
  horizon?: RecurrenceHorizon;
}

interface Measured {
  rule: ScheduleRule;
  projection: LineProjection;
}

function measure(point: Coord, candidates: readonly ScheduleRule[], maxDistanceMeters: number): Measured[] {
  const out: Measured[] = [];
  for (const rule of candidates) {
    const projection = closestPointOnLine(point, rule.line);
    if (projection && projection.distanceMeters <= maxDistanceMeters) {
      out.push({ rule, projection });
    }
  }
  return out;
}

function sideOf(point: Coord, { rule, projection }: Measured): StreetSide {
  const i = projection.segmentIndex;
  return classifySide(point, rule.line[i], rule.line[i + 1]);
}

function sameBlock(a: ScheduleRule, b: ScheduleRule): boolean {
  return a.corridor === b.corridor && a.limits === b.limits;
}

/**
 * Resolve the schedule that applies at `point`.
 *
 * The closest segment among the candidates within the radius decides the block
 * and the side of the street; every rule on that block whose block side names
 * that side is considered, and the one with the soonest next occurrence wins.
 * Returns null when nothing is within the radius or no rule covers that side.
 */
export function resolve(
  point: Coord,
  candidates: readonly ScheduleRule[],
  options: ResolveOptions = {},
): ResolvedMatch | null {
  const maxDistanceMeters = options.maxDistanceMeters ?? MAX_MATCH_RADIUS_METERS;
  const now = options.now ?? new Date();

  const measured = measure(point, candidates, maxDistanceMeters);
  if (measured.length === 0) return null;

  const best = measured.reduce((a, b) => (b.projection.distanceMeters < a.projection.distanceMeters ? b : a));
  const side = sideOf(point, best);

  const matching = measured
    .filter(m => sameBlock(m.rule, best.rule) && blockSideMatches(m.rule.block_side, side))
    .map(m => ({
      rule: m.rule,
      side,
      distanceMeters: m.projection.distanceMeters,
      nextOccurrence: nextOccurrence(m.rule, now, { timeZone: options.timeZone, horizon: options.horizon }),
    }));

  if (matching.length === 0) return null;

  const scheduled = matching.filter(m => m.nextOccurrence !== null);
  if (scheduled.length === 0) {
    return matching.reduce((a, b) => (b.distanceMeters < a.distanceMeters ? b : a));
  }

  return scheduled.reduce((a, b) => {
    const aStart = a.nextOccurrence?.start.getTime() ?? Number.POSITIVE_INFINITY;
    const bStart = b.nextOccurrence?.start.getTime() ?? Number.POSITIVE_INFINITY;
    if (bStart !== aStart) return bStart < aStart ? b : a;
    return b.distanceMeters < a.distanceMeters ? b : a;
  });
}

/**
 * Every candidate within `maxDistanceMeters` of `point`, closest first, with the
 * side of its own segment the point falls on.
 */
export function resolveNearby(
  point: Coord,
  candidates: readonly ScheduleRule[],
  options: ResolveOptions = {},
): NearbyMatch[] {
  const maxDistanceMeters = options.maxDistanceMeters ?? DEFAULT_NEARBY_DISTANCE_METERS;
  const now = options.now ?? new Date();

  return measure(point, candidates, maxDistanceMeters)
    .map(m => {
      const side = sideOf(point, m);
      return {
        rule: m.rule,
        side,
        distanceMeters: m.projection.distanceMeters,
        isUserSide: blockSideMatches(m.rule.block_side, side),
        nextOccurrence: nextOccurrence(m.rule, now, { timeZone: options.timeZone, horizon: options.horizon }),
      };
    })
    .sort((a, b) => a.distanceMeters - b.distanceMeters);
}
