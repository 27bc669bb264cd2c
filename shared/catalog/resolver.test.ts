import { describe, it, expect } from 'vitest';
import { MAX_MATCH_RADIUS_METERS, resolve, resolveNearby } from './resolver';
import type { Coord } from '../models';
import { Weekday } from '../models';
import { makeRule } from '../test-helpers';

const PACIFIC_TZ = 'America/Los_Angeles';
// Noon on Wednesday Jan 1, 2025, before the first Monday of the month
const NOW = new Date('2025-01-01T20:00:00Z');

const SOUTH_END: Coord = [-122.42, 37.77];
const NORTH_END: Coord = [-122.42, 37.771];
const METERS_PER_DEGREE_LON = 111194.93 * Math.cos((37.7705 * Math.PI) / 180);

const eastOf = (meters: number): Coord => [-122.42 + meters / METERS_PER_DEGREE_LON, 37.7705];
const westOf = (meters: number): Coord => [-122.42 - meters / METERS_PER_DEGREE_LON, 37.7705];

const oakEast = makeRule({
  id: 'oak-east',
  corridor: 'Oak St',
  limits: '300 - 400',
  block_side: 'East',
  weekday: Weekday.MON,
  week1: true,
  week3: true,
  line: [SOUTH_END, NORTH_END],
});
const oakWest = makeRule({
  id: 'oak-west',
  corridor: 'Oak St',
  limits: '300 - 400',
  block_side: 'West',
  weekday: Weekday.FRI,
  line: [SOUTH_END, NORTH_END],
});

const options = { now: NOW, timeZone: PACIFIC_TZ };

describe('resolve', () => {
  it('resolves a point east of a Monday block to its first Monday', () => {
    const match = resolve(eastOf(10), [oakWest, oakEast], options);

    expect(match?.rule.id).toBe('oak-east');
    expect(match?.side).toBe('East');
    expect(match?.distanceMeters).toBeCloseTo(10, 1);
    expect(match?.nextOccurrence?.start.toISOString()).toBe('2025-01-06T16:00:00.000Z');
  });

  it('classifies the side the same way when vertices are reversed', () => {
    const reversedEast = makeRule({ ...oakEast, line: [NORTH_END, SOUTH_END] });
    const reversedWest = makeRule({ ...oakWest, line: [NORTH_END, SOUTH_END] });

    expect(resolve(eastOf(10), [reversedEast, reversedWest], options)?.side).toBe('East');
    expect(resolve(westOf(10), [reversedEast, reversedWest], options)?.rule.id).toBe('oak-west');
  });

  it('never matches beyond the radius', () => {
    expect(resolve(eastOf(20), [oakEast], options)).toBeNull();
    expect(resolve(eastOf(20), [oakEast], { ...options, maxDistanceMeters: 25 })?.rule.id).toBe('oak-east');

    const match = resolve(eastOf(15), [oakEast], options);
    expect(match?.distanceMeters).toBeLessThanOrEqual(MAX_MATCH_RADIUS_METERS);
  });

  it('treats an uncovered side as no restriction', () => {
    expect(resolve(eastOf(10), [oakWest], options)).toBeNull();
  });

  it('picks the rule with the soonest occurrence on the same block and side', () => {
    const thursday = makeRule({ ...oakEast, id: 'oak-east-thu', weekday: Weekday.THU, from_hour: 12, to_hour: 14 });
    const match = resolve(eastOf(10), [oakEast, thursday], options);

    expect(match?.rule.id).toBe('oak-east-thu');
    expect(match?.nextOccurrence?.date).toBe('2025-01-02');
  });

  it('ignores rules on other blocks', () => {
    const otherBlock = makeRule({ ...oakEast, id: 'oak-next', limits: '400 - 500', weekday: Weekday.THU });
    expect(resolve(eastOf(10), [oakEast, otherBlock], options)?.rule.id).toBe('oak-east');
  });

  it('falls back to the closest rule when none has an upcoming occurrence', () => {
    const inactive = makeRule({ ...oakEast, week1: false, week3: false });
    const match = resolve(eastOf(10), [inactive], options);

    expect(match?.rule.id).toBe('oak-east');
    expect(match?.nextOccurrence).toBeNull();
  });

  it('matches compound block sides', () => {
    const mainNortheast = makeRule({
      id: 'main-ne',
      block_side: 'Northeast',
      line: [
        [-122.42, 37.77],
        [-122.419, 37.77],
      ],
    });
    const match = resolve([-122.4195, 37.7701], [mainNortheast], options);

    expect(match?.side).toBe('North');
    expect(match?.rule.id).toBe('main-ne');
  });
});

describe('resolveNearby', () => {
  it('lists every rule within the distance, closest first, flagging the user side', () => {
    const near = makeRule({ id: 'pine', corridor: 'Pine St', block_side: 'West', line: [[-122.419, 37.77], [-122.419, 37.771]] });
    const far = makeRule({ id: 'elm', corridor: 'Elm St', line: [[-122.4175, 37.77], [-122.4175, 37.771]] });

    const matches = resolveNearby(eastOf(10), [oakEast, oakWest, near, far], options);

    expect(matches.map(m => m.rule.id)).toEqual(['oak-east', 'oak-west', 'pine']);
    expect(matches.map(m => m.isUserSide)).toEqual([true, false, true]);
    expect(matches[2].side).toBe('West');
  });
});
