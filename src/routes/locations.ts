import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import type { AppEnv } from '../context';
import { serializeMatch, serializePlan, serializeReminder } from '../serializers';

const locations = new Hono<AppEnv>();

const paramSchema = z.object({
  location_id: z.string().regex(/^[A-Za-z0-9-]{1,64}$/),
});

const applySchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  device_token: z.string().trim().min(1).nullable().optional(),
  label: z.string().trim().min(1).max(80).nullable().optional(),
});

// POST /locations/:location_id/reminders
locations.post(
  '/:location_id/reminders',
  zValidator('param', paramSchema),
  zValidator('json', applySchema),
  async (c) => {
    const { location_id } = c.req.valid('param');
    const { latitude, longitude, device_token, label } = c.req.valid('json');
    const catalog = c.get('catalog');
    const scheduler = c.get('scheduler');

    if (catalog.status !== 'ready') {
      return c.json({ error: 'Schedule data is not available' }, 503);
    }

    const now = c.get('now')();
    const match = catalog.resolve([longitude, latitude], now);

    // No schedule here means no restriction, so nothing to remind about
    if (!match) {
      const cancelled = await scheduler.clearLocation(location_id);
      return c.json({ location_id, schedule: null, plan: null, reminders: [], cancelled }, 200);
    }

    const result = await scheduler.applyToLocation({
      locationId: location_id,
      label,
      rule: match.rule,
      side: match.side,
      deviceToken: device_token,
      occurrence: match.nextOccurrence ?? undefined,
    });

    return c.json({
      location_id,
      schedule: serializeMatch(match, catalog.activeWindow(match.rule, now), now, catalog.timeZone),
      plan: result.plan ? serializePlan(result.plan, catalog.timeZone) : null,
      reminders: result.reminders.map(r => serializeReminder(r, catalog.timeZone)),
      failed: result.failed,
    }, 201);
  },
);

// GET /locations/:location_id/reminders
locations.get(
  '/:location_id/reminders',
  zValidator('param', paramSchema),
  async (c) => {
    const { location_id } = c.req.valid('param');
    const scheduler = c.get('scheduler');
    const timeZone = c.get('catalog').timeZone;

    const plan = await scheduler.getLocationPlan(location_id);
    const reminders = await scheduler.listReminders(location_id);

    return c.json({
      location_id,
      plan: plan ? serializePlan(plan, timeZone) : null,
      reminders: reminders.map(r => serializeReminder(r, timeZone)),
    }, 200);
  },
);

// DELETE /locations/:location_id/reminders
locations.delete(
  '/:location_id/reminders',
  zValidator('param', paramSchema),
  async (c) => {
    const { location_id } = c.req.valid('param');
    const cancelled = await c.get('scheduler').clearLocation(location_id);
    return c.json({ location_id, cancelled }, 200);
  },
);

export default locations;
