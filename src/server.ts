import { serve } from '@hono/node-server';
import { ScheduleCatalog } from '../shared/catalog';
import { loadConfig } from '../shared/config';
import { createFcmSender } from '../shared/lib/fcm';
import { METERS_PER_FOOT } from '../shared/lib/geometry';
import { FileStore } from '../shared/storage';
import { AlarmDelivery, ReminderScheduler, startNotifyLoop } from '../notify/src';
import { createApp } from './index';

const config = loadConfig();
const horizon = { months: config.RECURRENCE_HORIZON_MONTHS };

const catalog = new ScheduleCatalog({
  timeZone: config.TIMEZONE,
  maxMatchRadiusMeters: config.MATCH_RADIUS_FEET * METERS_PER_FOOT,
  horizon,
});

const pushSender = createFcmSender({
  serviceAccountJson: config.FCM_SERVICE_ACCOUNT_JSON,
  projectId: config.FCM_PROJECT_ID,
  dryRun: config.NOTIFY_DRY_RUN,
});

const scheduler = new ReminderScheduler({
  store: new FileStore(config.REMINDER_STORE_DIR),
  delivery: new AlarmDelivery(pushSender),
  timeZone: config.TIMEZONE,
  maxPreferences: config.MAX_REMINDER_PREFERENCES,
  cleaningDurationMinutes: config.AFTER_CLEANING_MINUTES,
  retryDelayMs: config.DELIVERY_RETRY_DELAY_MS,
  horizon,
});

const app = createApp({
  catalog,
  scheduler,
  pushSender,
  notifyRunToken: config.NOTIFY_RUN_TOKEN,
});

// Queries answer "no data" until the table is loaded
catalog.load(config.SCHEDULE_TABLE_PATH).then((status) => {
  console.log('Schedule table loaded', { status, rules: catalog.size, reason: catalog.unavailableReason });
}).catch((err) => {
  console.error('Schedule table load failed', err);
});

async function startReminders(): Promise<void> {
  await scheduler.ensureDefaultPreferences();
  const result = await scheduler.reconcile();
  console.log('Reminders restored', result);
}

startReminders().catch((err) => {
  console.error('Reminder startup failed', err);
});
const stopLoop = startNotifyLoop(scheduler, config.NOTIFY_CADENCE_MINUTES);

const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  console.log('Listening', { port: info.port, timezone: config.TIMEZONE });
});

process.on('SIGTERM', () => {
  stopLoop();
  server.close();
});
