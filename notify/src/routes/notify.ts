import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import type { PushSender } from '../../../shared/lib/fcm';
import type { ReminderScheduler } from '../scheduler';

type Variables = {
  scheduler: ReminderScheduler;
  pushSender: PushSender;
  notifyRunToken: string | undefined;
};

const notify = new Hono<{ Variables: Variables }>();

function isAuthorized(header: string | undefined, configuredToken: string | undefined): boolean {
  const configured = (configuredToken || '').trim();
  if (!configured) return false;
  const value = header || '';
  const token = value.startsWith('Bearer ') ? value.slice('Bearer '.length).trim() : value.trim();
  return token.length > 0 && token === configured;
}

// POST /internal/notify/reconcile
notify.post('/reconcile', async (c) => {
  if (!isAuthorized(c.req.header('authorization'), c.get('notifyRunToken'))) {
    return c.json({ error: 'Unauthorized' }, 401);
  }

  const result = await c.get('scheduler').reconcile();
  return c.json(result, 200);
});

const testPushSchema = z.object({
  device_token: z.string().min(20),
  title: z.string().min(1).default('🧹 Test notification'),
  body: z.string().min(1).default('This is a test push from the street cleaning reminder service.'),
});

// POST /internal/notify/test-push
notify.post(
  '/test-push',
  zValidator('json', testPushSchema),
  async (c) => {
    if (!isAuthorized(c.req.header('authorization'), c.get('notifyRunToken'))) {
      return c.json({ error: 'Unauthorized' }, 401);
    }

    const payload = c.req.valid('json');
    await c.get('pushSender').send({
      deviceToken: payload.device_token,
      title: payload.title,
      body: payload.body,
      data: { test: 'true' },
    });

    return c.json({
      ok: true,
      device_token_suffix: payload.device_token.slice(-10),
    }, 200);
  },
);

export default notify;
