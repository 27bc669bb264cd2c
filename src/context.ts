import type { ScheduleCatalog } from '../shared/catalog';
import type { PushSender } from '../shared/lib/fcm';
import type { ReminderScheduler } from '../notify/src/scheduler';

export interface AppDeps {
  catalog: ScheduleCatalog;
  scheduler: ReminderScheduler;
  pushSender: PushSender;
  notifyRunToken?: string;
  now?: () => Date;
}

export type AppEnv = {
  Variables: {
    catalog: ScheduleCatalog;
    scheduler: ReminderScheduler;
    pushSender: PushSender;
    notifyRunToken: string | undefined;
    now: () => Date;
  };
};
