import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { notifyRoutes } from '../notify/src';
import type { AppDeps, AppEnv } from './context';
import locations from './routes/locations';
import preferences from './routes/preferences';
import schedules from './routes/schedules';

export type { AppDeps } from './context';

export function createApp(deps: AppDeps) {
  const app = new Hono<AppEnv>();
  const now = deps.now ?? (() => new Date());

  // CORS middleware
  app.use('/*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use('*', async (c, next) => {
    c.set('catalog', deps.catalog);
    c.set('scheduler', deps.scheduler);
    c.set('pushSender', deps.pushSender);
    c.set('notifyRunToken', deps.notifyRunToken);
    c.set('now', now);
    await next();
  });

  // Health check
  app.get('/health', (c) => c.json({
    status: 'ok',
    schedules: deps.catalog.status,
    rules: deps.catalog.size,
  }));

  // Mount routes
  app.route('/', schedules);
  app.route('/preferences', preferences);
  app.route('/locations', locations);
  app.route('/internal/notify', notifyRoutes);

  return app;
}
