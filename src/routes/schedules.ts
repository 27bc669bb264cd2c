import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import { MAX_HORIZON_MONTHS, MAX_HORIZON_WEEKS } from '../../shared/lib/calendar';
import type { RecurrenceHorizon } from '../../shared/lib/calendar';
import type { Coord } from '../../shared/models';
import type { AppEnv } from '../context';
import { serializeMatch, serializeNearby, serializeOccurrence } from '../serializers';

const schedules = new Hono<AppEnv>();

const locationSchema = z.object({
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180),
});

const nearbySchema = locationSchema.extend({
  radius_cells: z.coerce.number().int().min(1).max(20).optional(),
  max_distance_meters: z.coerce.number().positive().max(1000).optional(),
});

const occurrencesSchema = z
  .object({
    after: z.string().datetime({ offset: true }).optional(),
    months: z.coerce.number().int().min(1).max(MAX_HORIZON_MONTHS).optional(),
    weeks: z.coerce.number().int().min(1).max(MAX_HORIZON_WEEKS).optional(),
    limit: z.coerce.number().int().min(1).max(100).optional(),
  })
  .refine(q => q.months === undefined || q.weeks === undefined, {
    message: 'Pass either months or weeks',
  });

// GET /check-location
schedules.get(
  '/check-location',
  zValidator('query', locationSchema),
  (c) => {
    const { latitude, longitude } = c.req.valid('query');
    const catalog = c.get('catalog');
    const now = c.get('now')();
    const point: Coord = [longitude, latitude];

    const match = catalog.status === 'ready' ? catalog.resolve(point, now) : null;

    return c.json({
      request_point: { latitude, longitude },
      timezone: catalog.timeZone,
      data_available: catalog.status === 'ready',
      schedule: match
        ? serializeMatch(match, catalog.activeWindow(match.rule, now), now, catalog.timeZone)
        : null,
    }, 200);
  },
);

// GET /nearby
schedules.get(
  '/nearby',
  zValidator('query', nearbySchema),
  (c) => {
    const { latitude, longitude, radius_cells, max_distance_meters } = c.req.valid('query');
    const catalog = c.get('catalog');
    const now = c.get('now')();

    const matches = catalog.status === 'ready'
      ? catalog.nearby([longitude, latitude], { radiusCells: radius_cells, maxDistanceMeters: max_distance_meters, now })
      : [];

    return c.json({
      request_point: { latitude, longitude },
      timezone: catalog.timeZone,
      data_available: catalog.status === 'ready',
      schedules: matches.map(m => serializeNearby(m, catalog.activeWindow(m.rule, now), now, catalog.timeZone)),
    }, 200);
  },
);

// GET /schedules/:id/occurrences
schedules.get(
  '/schedules/:id/occurrences',
  zValidator('query', occurrencesSchema),
  (c) => {
    const catalog = c.get('catalog');
    const rule = catalog.getRule(c.req.param('id'));
    if (!rule) {
      return c.json({ error: 'Schedule not found' }, 404);
    }

    const query = c.req.valid('query');
    const after = query.after ? new Date(query.after) : c.get('now')();
    let horizon: RecurrenceHorizon | undefined;
    if (query.weeks !== undefined) horizon = { weeks: query.weeks };
    else if (query.months !== undefined) horizon = { months: query.months };

    const occurrences = catalog.occurrences(rule, after, { horizon, limit: query.limit });

    return c.json({
      id: rule.id,
      timezone: catalog.timeZone,
      occurrences: occurrences.map(o => serializeOccurrence(o, catalog.timeZone)),
    }, 200);
  },
);

export default schedules;
