import { z } from 'zod';
import type { Coord, StreetSide } from '../models';

const EARTH_RADIUS_METERS = 6371000;
const METERS_PER_DEGREE = (Math.PI / 180) * EARTH_RADIUS_METERS;
export const METERS_PER_FOOT = 1 / 3.28084;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

// Serialized coordinates may carry a third (elevation) value; only lon/lat are kept
const CoordinateListSchema = z.array(z.array(z.number()).min(2));

function isValidCoord([lon, lat]: Coord): boolean {
  return Number.isFinite(lon) && Number.isFinite(lat) && Math.abs(lon) <= 180 && Math.abs(lat) <= 90;
}

function collapseDuplicates(points: Coord[]): Coord[] {
  const out: Coord[] = [];
  for (const point of points) {
    const last = out[out.length - 1];
    if (last && last[0] === point[0] && last[1] === point[1]) continue;
    out.push(point);
  }
  return out;
}

function matchingBracket(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    if (text[i] === '[') depth++;
    else if (text[i] === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function parseCoordinateArray(text: string): Coord[] | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    console.error('Unreadable coordinate array', { error: String(error) });
    return null;
  }
  const parsed = CoordinateListSchema.safeParse(raw);
  if (!parsed.success) return null;
  return parsed.data.map(([lon, lat]): Coord => [lon, lat]);
}

function parseWkt(text: string): Coord[] | null {
  const match = /^LINESTRING\s*\(([^)]*)\)\s*$/i.exec(text);
  if (!match) return null;

  const points: Coord[] = [];
  for (const pair of match[1].split(',')) {
    const parts = pair.trim().split(/\s+/).map(Number);
    if (parts.length < 2) return null;
    points.push([parts[0], parts[1]]);
  }
  return points;
}

/**
 * Extract `[lon, lat]` vertices from a serialized LineString.
 *
 * Accepts GeoJSON-like objects with single or double quoted keys
 * (`{'type': 'LineString', 'coordinates': [[lon, lat], ...]}`), a bare coordinate
 * array, or WKT (`LINESTRING (lon lat, lon lat)`). Consecutive duplicate vertices
 * are collapsed. Returns null unless at least two distinct valid vertices remain.
 */
export function parseLineGeometry(text: string | null | undefined): Coord[] | null {
  const trimmed = (text || '').trim();
  if (!trimmed) return null;

  let points: Coord[] | null;
  if (/^LINESTRING/i.test(trimmed)) {
    points = parseWkt(trimmed);
  } else if (trimmed.startsWith('[')) {
    points = parseCoordinateArray(trimmed);
  } else {
    const key = /['"]coordinates['"]\s*:\s*\[/.exec(trimmed);
    if (!key) return null;
    const open = key.index + key[0].length - 1;
    const close = matchingBracket(trimmed, open);
    if (close === -1) return null;
    points = parseCoordinateArray(trimmed.slice(open, close + 1));
  }

  if (!points || !points.every(isValidCoord)) return null;
  const distinct = collapseDuplicates(points);
  return distinct.length >= 2 ? distinct : null;
}

/**
 * Great-circle distance between two `[lon, lat]` points, in meters.
 */
export function haversineMeters([lon1, lat1]: Coord, [lon2, lat2]: Coord): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) * Math.sin(dLon / 2);
  return EARTH_RADIUS_METERS * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

export interface SegmentProjection {
  point: Coord;
  distanceMeters: number;
  t: number;  // 0 at the segment start, 1 at its end
}

/**
 * Closest point on segment a-b to `point`.
 *
 * The projection happens in an equirectangular plane centred on `point`, so
 * longitude is scaled by cos(latitude) before measuring; the reported distance is
 * the haversine distance to the projected point.
 */
export function closestPointOnSegment(point: Coord, a: Coord, b: Coord): SegmentProjection {
  const scale = Math.cos(toRadians(point[1]));
  const ax = (a[0] - point[0]) * scale * METERS_PER_DEGREE;
  const ay = (a[1] - point[1]) * METERS_PER_DEGREE;
  const dx = (b[0] - a[0]) * scale * METERS_PER_DEGREE;
  const dy = (b[1] - a[1]) * METERS_PER_DEGREE;
  const lenSq = dx * dx + dy * dy;

  let t = 0;
  if (lenSq > 0) {
    t = Math.max(0, Math.min(1, (-ax * dx - ay * dy) / lenSq));
  }

  const closest: Coord = [a[0] + t * (b[0] - a[0]), a[1] + t * (b[1] - a[1])];
  return { point: closest, distanceMeters: haversineMeters(point, closest), t };
}

export interface LineProjection extends SegmentProjection {
  segmentIndex: number;
}

/**
 * Closest point on a polyline. Ties keep the earliest segment.
 */
export function closestPointOnLine(point: Coord, line: readonly Coord[]): LineProjection | null {
  let best: LineProjection | null = null;
  for (let i = 0; i < line.length - 1; i++) {
    const projection = closestPointOnSegment(point, line[i], line[i + 1]);
    if (!best || projection.distanceMeters < best.distanceMeters) {
      best = { ...projection, segmentIndex: i };
    }
  }
  return best;
}

/**
 * z-component of (end - start) x (point - start) in the local plane; positive means
 * the point lies left of the direction of travel.
 */
export function crossProduct(point: Coord, start: Coord, end: Coord): number {
  const scale = Math.cos(toRadians(point[1]));
  const ex = (end[0] - start[0]) * scale;
  const ey = end[1] - start[1];
  const px = (point[0] - start[0]) * scale;
  const py = point[1] - start[1];
  return ex * py - ey * px;
}

/**
 * Initial bearing from start to end in degrees, 0 = north, clockwise.
 */
export function segmentBearing([lon1, lat1]: Coord, [lon2, lat2]: Coord): number {
  const dLon = toRadians(lon2 - lon1);
  const y = Math.sin(dLon) * Math.cos(toRadians(lat2));
  const x =
    Math.cos(toRadians(lat1)) * Math.sin(toRadians(lat2)) -
    Math.sin(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.cos(dLon);
  return ((Math.atan2(y, x) * 180) / Math.PI + 360) % 360;
}

/**
 * Compass side of segment start-end that `point` falls on.
 */
export function classifySide(point: Coord, start: Coord, end: Coord): StreetSide {
  const left = crossProduct(point, start, end) > 0;
  const bearing = segmentBearing(start, end);

  if (bearing >= 315 || bearing < 45) {
    return left ? 'West' : 'East';    // northbound
  }
  if (bearing < 135) {
    return left ? 'North' : 'South';  // eastbound
  }
  if (bearing < 225) {
    return left ? 'East' : 'West';    // southbound
  }
  return left ? 'South' : 'North';    // westbound
}

const SIDE_ABBREVIATIONS: Record<string, string> = {
  n: 'north',
  s: 'south',
  e: 'east',
  w: 'west',
  ne: 'northeast',
  nw: 'northwest',
  se: 'southeast',
  sw: 'southwest',
};

/**
 * Whether a table's free-text block side names the given compass side.
 * Compound labels match each component ("Northeast" matches North and East).
 */
export function blockSideMatches(blockSide: string, side: StreetSide): boolean {
  const normalized = blockSide.trim().toLowerCase();
  const expanded = SIDE_ABBREVIATIONS[normalized] ?? normalized;
  return expanded.includes(side.toLowerCase());
}
