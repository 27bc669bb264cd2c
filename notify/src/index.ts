import type { ReminderScheduler } from './scheduler';

export { AlarmDelivery } from './delivery';
export type { DeliveryRequest, ReminderDelivery } from './delivery';
export { ReminderScheduler } from './scheduler';
export { default as notifyRoutes } from './routes/notify';

/**
 * Run `reconcile` every `cadenceMinutes`. Returns a function that stops the loop.
 */
export function startNotifyLoop(scheduler: ReminderScheduler, cadenceMinutes: number): () => void {
  let running = false;

  const tick = async () => {
    // Skip a tick while the previous one is still going
    if (running) return;
    running = true;
    try {
      await scheduler.reconcile();
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    tick().catch((err) => {
      console.error('Reminder reconcile failed', err);
    });
  }, cadenceMinutes * 60 * 1000);
  timer.unref();

  return () => clearInterval(timer);
}
