import { vi } from 'vitest';
import { ScheduleCatalog } from '../shared/catalog';
import type { PushMessage } from '../shared/lib/fcm';
import type { ScheduleRule } from '../shared/models';
import { MemoryStore } from '../shared/storage';
import { ReminderScheduler } from '../notify/src/scheduler';
import { FakeDelivery } from '../notify/src/test-helpers';
import { createApp } from './index';

export const TEST_TZ = 'America/Los_Angeles';
// Wednesday Jan 1, 2025, noon Pacific
export const TEST_NOW = new Date('2025-01-01T20:00:00Z');
export const TEST_TOKEN = 'test-secret';

export interface TestAppOptions {
  // Leaves the catalog in its loading state when omitted
  rules?: ScheduleRule[];
  now?: Date;
}

export function createTestApp(options: TestAppOptions = {}) {
  const now = options.now ?? TEST_NOW;
  const catalog = options.rules
    ? ScheduleCatalog.fromRules(options.rules, { timeZone: TEST_TZ })
    : new ScheduleCatalog({ timeZone: TEST_TZ });
  const delivery = new FakeDelivery();
  let counter = 0;
  const scheduler = new ReminderScheduler({
    store: new MemoryStore(),
    delivery,
    timeZone: TEST_TZ,
    now: () => now,
    generateId: () => `pref-${++counter}`,
    sleep: async () => {},
  });
  const sender = { send: vi.fn(async (_message: PushMessage) => {}) };

  const app = createApp({
    catalog,
    scheduler,
    pushSender: sender,
    notifyRunToken: TEST_TOKEN,
    now: () => now,
  });

  return { app, catalog, scheduler, delivery, sender };
}

export function jsonRequest(method: string, path: string, body: unknown, headers: Record<string, string> = {}): Request {
  return new Request(`http://localhost${path}`, {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}
