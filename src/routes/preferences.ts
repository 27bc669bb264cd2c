import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import { ReminderTimingSchema } from '../../shared/models';
import { formatTiming } from '../../shared/lib/formatting';
import type { ReminderPreference } from '../../shared/models';
import type { AppEnv } from '../context';

const preferences = new Hono<AppEnv>();

const titleSchema = z.string().trim().min(1).max(80);
const messageSchema = z.string().trim().min(1).max(280).nullable();

const createSchema = z.object({
  title: titleSchema.optional(),
  message: messageSchema.optional(),
  timing: ReminderTimingSchema,
  is_active: z.boolean().optional(),
  force: z.boolean().default(false),
});

const updateSchema = z.object({
  title: titleSchema.optional(),
  message: messageSchema.optional(),
  timing: ReminderTimingSchema.optional(),
  is_active: z.boolean().optional(),
  force: z.boolean().default(false),
});

function serializePreference(preference: ReminderPreference) {
  return { ...preference, label: formatTiming(preference.timing) };
}

// GET /preferences
preferences.get('/', async (c) => {
  const list = await c.get('scheduler').listPreferences();
  return c.json({ preferences: list.map(serializePreference) }, 200);
});

// POST /preferences
preferences.post(
  '/',
  zValidator('json', createSchema),
  async (c) => {
    const { force, ...input } = c.req.valid('json');
    const result = await c.get('scheduler').addPreference(input, { force });

    switch (result.status) {
      case 'added':
        return c.json({ preference: serializePreference(result.preference) }, 201);
      case 'duplicate':
        return c.json({ error: 'A reminder with this timing already exists', existing: serializePreference(result.existing) }, 409);
      case 'max_reached':
        return c.json({ error: `At most ${result.limit} reminders are allowed`, limit: result.limit }, 422);
    }
  },
);

// PATCH /preferences/:id
preferences.patch(
  '/:id',
  zValidator('json', updateSchema),
  async (c) => {
    const { force, ...patch } = c.req.valid('json');
    const result = await c.get('scheduler').updatePreference(c.req.param('id'), patch, { force });

    switch (result.status) {
      case 'updated':
        return c.json({ preference: serializePreference(result.preference) }, 200);
      case 'duplicate':
        return c.json({ error: 'A reminder with this timing already exists', existing: serializePreference(result.existing) }, 409);
      case 'not_found':
        return c.json({ error: 'Preference not found' }, 404);
    }
  },
);

// DELETE /preferences/:id
preferences.delete('/:id', async (c) => {
  const removed = await c.get('scheduler').removePreference(c.req.param('id'));
  if (!removed) {
    return c.json({ error: 'Preference not found' }, 404);
  }
  return c.json({ deleted: true }, 200);
});

export default preferences;
