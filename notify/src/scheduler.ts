import { randomUUID } from 'node:crypto';
import pLimit from 'p-limit';
import { z } from 'zod';
import type {
  LocationPlan,
  Occurrence,
  ReminderPreference,
  ReminderTiming,
  ScheduleRule,
  ScheduledReminder,
  StreetSide,
} from '../../shared/models';
import { LocationPlanSchema, ReminderPreferenceSchema, ScheduledReminderSchema } from '../../shared/models';
import type { RecurrenceHorizon } from '../../shared/lib/calendar';
import { DEFAULT_HORIZON, nextOccurrence } from '../../shared/lib/calendar';
import { buildReminderContent, formatTiming } from '../../shared/lib/formatting';
import { computeReminders, sameTiming } from '../../shared/lib/timing';
import { zonedDateKey } from '../../shared/lib/timezone';
import type { KeyValueStore } from '../../shared/storage';
import { readJson, writeJson } from '../../shared/storage';
import type { DeliveryRequest, ReminderDelivery } from './delivery';

export const STORE_KEYS = {
  preferences: 'reminder_preferences',
  reminders: 'scheduled_reminders',
  plans: 'location_plans',
  defaultsCreated: 'reminder_defaults_created',
} as const;

export const MAX_REMINDER_PREFERENCES = 25;
export const DELIVERY_RETRY_DELAY_MS = 1000;

const PreferencesSchema = z.array(ReminderPreferenceSchema);
const RemindersSchema = z.array(ScheduledReminderSchema);
const PlansSchema = z.array(LocationPlanSchema);

const DEFAULT_PREFERENCES: { title: string; timing: ReminderTiming }[] = [
  {
    title: 'Evening Before',
    timing: { kind: 'custom', amount: 1, unit: 'days', anchor: 'before', time_of_day: { hour: 17, minute: 0 } },
  },
  {
    title: 'Morning Of',
    timing: { kind: 'custom', amount: 0, unit: 'days', anchor: 'before', time_of_day: { hour: 8, minute: 0 } },
  },
  {
    title: '30 Minutes Before',
    timing: { kind: 'preset', preset: 'thirty_minutes' },
  },
];

export interface PreferenceInput {
  title?: string;
  message?: string | null;
  timing: ReminderTiming;
  is_active?: boolean;
}

export type PreferencePatch = Partial<PreferenceInput>;

export type AddPreferenceResult =
  | { status: 'added'; preference: ReminderPreference }
  | { status: 'duplicate'; existing: ReminderPreference }
  | { status: 'max_reached'; limit: number };

export type UpdatePreferenceResult =
  | { status: 'updated'; preference: ReminderPreference }
  | { status: 'duplicate'; existing: ReminderPreference }
  | { status: 'not_found' };

export interface ApplyLocationInput {
  locationId: string;
  label?: string | null;
  rule: ScheduleRule;
  side: StreetSide;
  deviceToken?: string | null;
  // Defaults to the rule's next occurrence
  occurrence?: Occurrence;
}

export interface ApplyLocationResult {
  plan: LocationPlan | null;
  reminders: ScheduledReminder[];
  failed: string[];
}

export interface ReconcileResult {
  dropped: number;
  resubmitted: number;
  failed: number;
  rolled_forward: number;
}

export interface ReminderSchedulerOptions {
  store: KeyValueStore;
  delivery: ReminderDelivery;
  timeZone: string;
  maxPreferences?: number;
  cleaningDurationMinutes?: number;
  retryDelayMs?: number;
  horizon?: RecurrenceHorizon;
  now?: () => Date;
  generateId?: () => string;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Keeps reminder preferences, the reminders computed from them and what the
 * delivery collaborator has pending consistent with each other.
 *
 * Every mutation is a read-modify-write of whole persisted collections, run one
 * at a time.
 */
export class ReminderScheduler {
  private readonly store: KeyValueStore;
  private readonly delivery: ReminderDelivery;
  private readonly timeZone: string;
  private readonly maxPreferences: number;
  private readonly cleaningDurationMinutes: number | undefined;
  private readonly retryDelayMs: number;
  private readonly horizon: RecurrenceHorizon;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly exclusive = pLimit(1);

  constructor(options: ReminderSchedulerOptions) {
    this.store = options.store;
    this.delivery = options.delivery;
    this.timeZone = options.timeZone;
    this.maxPreferences = options.maxPreferences ?? MAX_REMINDER_PREFERENCES;
    this.cleaningDurationMinutes = options.cleaningDurationMinutes;
    this.retryDelayMs = options.retryDelayMs ?? DELIVERY_RETRY_DELAY_MS;
    this.horizon = options.horizon ?? DEFAULT_HORIZON;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.sleep = options.sleep ?? (ms => new Promise<void>(resolve => setTimeout(resolve, ms)));
  }

  // Persistence

  private readPreferences(): Promise<ReminderPreference[]> {
    return readJson(this.store, STORE_KEYS.preferences, PreferencesSchema, []);
  }

  private readReminders(): Promise<ScheduledReminder[]> {
    return readJson(this.store, STORE_KEYS.reminders, RemindersSchema, []);
  }

  private readPlans(): Promise<LocationPlan[]> {
    return readJson(this.store, STORE_KEYS.plans, PlansSchema, []);
  }

  private writeReminders(reminders: ScheduledReminder[]): Promise<void> {
    const sorted = [...reminders].sort((a, b) => Date.parse(a.fire_at) - Date.parse(b.fire_at));
    return writeJson(this.store, STORE_KEYS.reminders, sorted);
  }

  // Preferences

  async listPreferences(): Promise<ReminderPreference[]> {
    return this.readPreferences();
  }

  /**
   * Add a preference. The cap applies before anything else; a preference whose
   * timing matches an active one is rejected unless `force` is set.
   */
  addPreference(input: PreferenceInput, options: { force?: boolean } = {}): Promise<AddPreferenceResult> {
    return this.exclusive(async (): Promise<AddPreferenceResult> => {
      const preferences = await this.readPreferences();

      if (preferences.length >= this.maxPreferences) {
        console.log('Reminder preference cap reached', { limit: this.maxPreferences });
        return { status: 'max_reached', limit: this.maxPreferences };
      }

      const existing = preferences.find(p => p.is_active && sameTiming(p.timing, input.timing));
      if (existing && !options.force) {
        return { status: 'duplicate', existing };
      }

      const preference: ReminderPreference = {
        id: this.generateId(),
        title: input.title?.trim() || formatTiming(input.timing),
        message: input.message ?? null,
        timing: input.timing,
        is_active: input.is_active ?? true,
        created_at: this.now().toISOString(),
      };
      await writeJson(this.store, STORE_KEYS.preferences, [...preferences, preference]);
      await this.refreshPreference(preference);
      return { status: 'added', preference };
    });
  }

  updatePreference(id: string, patch: PreferencePatch, options: { force?: boolean } = {}): Promise<UpdatePreferenceResult> {
    return this.exclusive(async (): Promise<UpdatePreferenceResult> => {
      const preferences = await this.readPreferences();
      const current = preferences.find(p => p.id === id);
      if (!current) {
        return { status: 'not_found' };
      }

      const updated: ReminderPreference = {
        ...current,
        title: patch.title?.trim() || current.title,
        message: patch.message === undefined ? current.message : patch.message,
        timing: patch.timing ?? current.timing,
        is_active: patch.is_active ?? current.is_active,
      };

      if (updated.is_active && !options.force) {
        const existing = preferences.find(p => p.id !== id && p.is_active && sameTiming(p.timing, updated.timing));
        if (existing) {
          return { status: 'duplicate', existing };
        }
      }

      await writeJson(
        this.store,
        STORE_KEYS.preferences,
        preferences.map(p => (p.id === id ? updated : p)),
      );
      await this.refreshPreference(updated);
      return { status: 'updated', preference: updated };
    });
  }

  async setPreferenceActive(id: string, isActive: boolean): Promise<UpdatePreferenceResult> {
    return this.updatePreference(id, { is_active: isActive }, { force: !isActive });
  }

  /**
   * Delete a preference and cancel every reminder created from it.
   */
  removePreference(id: string): Promise<boolean> {
    return this.exclusive(async (): Promise<boolean> => {
      const preferences = await this.readPreferences();
      if (!preferences.some(p => p.id === id)) {
        return false;
      }

      await writeJson(
        this.store,
        STORE_KEYS.preferences,
        preferences.filter(p => p.id !== id),
      );
      await this.dropReminders(r => r.preference_id === id);
      return true;
    });
  }

  /**
   * Create the starter preferences the first time the scheduler runs against a
   * store. Later calls, even after the user deleted them, change nothing.
   */
  ensureDefaultPreferences(): Promise<ReminderPreference[]> {
    return this.exclusive(async (): Promise<ReminderPreference[]> => {
      const created = await readJson(this.store, STORE_KEYS.defaultsCreated, z.boolean(), false);
      const preferences = await this.readPreferences();
      if (created || preferences.length > 0) {
        if (!created) await writeJson(this.store, STORE_KEYS.defaultsCreated, true);
        return preferences;
      }

      const createdAt = this.now().toISOString();
      const defaults = DEFAULT_PREFERENCES.map(({ title, timing }): ReminderPreference => ({
        id: this.generateId(),
        title,
        message: null,
        timing,
        is_active: true,
        created_at: createdAt,
      }));
      await writeJson(this.store, STORE_KEYS.preferences, defaults);
      await writeJson(this.store, STORE_KEYS.defaultsCreated, true);
      console.log('Created default reminder preferences', { count: defaults.length });

      for (const preference of defaults) {
        await this.refreshPreference(preference);
      }
      return defaults;
    });
  }

  // Locations

  /**
   * Replace a location's reminders with those for `occurrence` (or the rule's
   * next one). Previous reminders of the location are cancelled first; new ones
   * are persisted before they are submitted, so a failed submission is retried
   * by a later reconcile.
   */
  applyToLocation(input: ApplyLocationInput): Promise<ApplyLocationResult> {
    return this.exclusive(async (): Promise<ApplyLocationResult> => {
      const now = this.now();
      await this.dropReminders(r => r.location_id === input.locationId);

      const occurrence =
        input.occurrence ?? nextOccurrence(input.rule, now, { timeZone: this.timeZone, horizon: this.horizon });
      const plans = (await this.readPlans()).filter(p => p.location_id !== input.locationId);

      if (!occurrence) {
        await writeJson(this.store, STORE_KEYS.plans, plans);
        console.log('No upcoming occurrence for location', { locationId: input.locationId, ruleId: input.rule.id });
        return { plan: null, reminders: [], failed: [] };
      }

      const plan: LocationPlan = {
        location_id: input.locationId,
        label: input.label ?? null,
        rule: input.rule,
        side: input.side,
        occurrence_start: occurrence.start.toISOString(),
        occurrence_end: occurrence.end.toISOString(),
        device_token: input.deviceToken ?? null,
        updated_at: now.toISOString(),
      };
      await writeJson(this.store, STORE_KEYS.plans, [...plans, plan]);

      const created = this.remindersFor(plan, occurrence, await this.readPreferences(), now);
      const { submitted, failed } = await this.persistAndSubmit(created);
      return { plan, reminders: submitted, failed };
    });
  }

  /**
   * Forget a location and cancel its reminders. Returns how many were cancelled.
   */
  clearLocation(locationId: string): Promise<number> {
    return this.exclusive(async (): Promise<number> => {
      const plans = await this.readPlans();
      await writeJson(
        this.store,
        STORE_KEYS.plans,
        plans.filter(p => p.location_id !== locationId),
      );
      return this.dropReminders(r => r.location_id === locationId);
    });
  }

  async getLocationPlan(locationId: string): Promise<LocationPlan | null> {
    return (await this.readPlans()).find(p => p.location_id === locationId) ?? null;
  }

  async listReminders(locationId?: string): Promise<ScheduledReminder[]> {
    const reminders = await this.readReminders();
    return locationId === undefined ? reminders : reminders.filter(r => r.location_id === locationId);
  }

  /**
   * Bring persisted reminders and the delivery collaborator back in line:
   * drop reminders whose fire time has passed, move locations whose occurrence
   * has started on to their next occurrence, and re-submit every future reminder
   * the collaborator no longer reports as pending.
   */
  reconcile(now: Date = this.now()): Promise<ReconcileResult> {
    return this.exclusive(async (): Promise<ReconcileResult> => {
      const stored = await this.readReminders();
      const future = stored.filter(r => Date.parse(r.fire_at) > now.getTime());
      const dropped = stored.length - future.length;

      // Roll forward: reminders of the started occurrence stay until they fire
      const preferences = await this.readPreferences();
      const plans = await this.readPlans();
      const rolled: ScheduledReminder[] = [];
      let rolledForward = 0;

      const nextPlans = plans.map(plan => {
        if (Date.parse(plan.occurrence_start) > now.getTime()) return plan;

        const next = nextOccurrence(plan.rule, now, { timeZone: this.timeZone, horizon: this.horizon });
        if (!next) return plan;

        rolledForward += 1;
        const updated: LocationPlan = {
          ...plan,
          occurrence_start: next.start.toISOString(),
          occurrence_end: next.end.toISOString(),
          updated_at: now.toISOString(),
        };
        rolled.push(...this.remindersFor(updated, next, preferences, now));
        return updated;
      });
      if (rolledForward > 0) {
        await writeJson(this.store, STORE_KEYS.plans, nextPlans);
        console.log('Rolled locations forward', { count: rolledForward });
      }

      const known = new Set(future.map(r => r.id));
      const reminders = [...future, ...rolled.filter(r => !known.has(r.id))];
      await this.writeReminders(reminders);

      const pending = new Set(await this.delivery.pendingIds());
      const missing = reminders.filter(r => !pending.has(r.id));

      const statuses = await this.submitAll(missing);
      await this.updateStatuses(statuses);
      const failed = [...statuses.values()].filter(status => status === 'pending').length;

      const result = { dropped, resubmitted: statuses.size - failed, failed, rolled_forward: rolledForward };
      console.log('Reconcile done', result);
      return result;
    });
  }

  // Internals; callers hold the exclusive lock

  private remindersFor(
    plan: LocationPlan,
    occurrence: Occurrence,
    preferences: readonly ReminderPreference[],
    now: Date,
  ): ScheduledReminder[] {
    return computeReminders({
      locationId: plan.location_id,
      rule: plan.rule,
      occurrence,
      preferences,
      now,
      timeZone: this.timeZone,
      cleaningDurationMinutes: this.cleaningDurationMinutes,
      deviceToken: plan.device_token,
      describe: preference => buildReminderContent(preference, plan.rule, occurrence, this.timeZone),
    });
  }

  private planOccurrence(plan: LocationPlan): Occurrence {
    const start = new Date(plan.occurrence_start);
    const date = zonedDateKey(start, this.timeZone);
    return {
      start,
      end: new Date(plan.occurrence_end),
      date,
      weekOfMonth: Math.ceil(Number(date.slice(8, 10)) / 7),
    };
  }

  /**
   * Remove matching reminders from the store and from the collaborator.
   */
  private async dropReminders(predicate: (reminder: ScheduledReminder) => boolean): Promise<number> {
    const reminders = await this.readReminders();
    const removed = reminders.filter(predicate);
    if (removed.length === 0) return 0;

    await this.writeReminders(reminders.filter(r => !predicate(r)));
    await this.delivery.cancel(removed.map(r => r.id));
    return removed.length;
  }

  /**
   * Recompute one preference's reminders for every location after it was added
   * or changed.
   */
  private async refreshPreference(preference: ReminderPreference): Promise<void> {
    await this.dropReminders(r => r.preference_id === preference.id);
    if (!preference.is_active) return;

    const now = this.now();
    const created: ScheduledReminder[] = [];
    for (const plan of await this.readPlans()) {
      created.push(...this.remindersFor(plan, this.planOccurrence(plan), [preference], now));
    }
    await this.persistAndSubmit(created);
  }

  private async persistAndSubmit(created: ScheduledReminder[]): Promise<{ submitted: ScheduledReminder[]; failed: string[] }> {
    if (created.length === 0) {
      return { submitted: [], failed: [] };
    }

    const ids = new Set(created.map(r => r.id));
    const existing = (await this.readReminders()).filter(r => !ids.has(r.id));
    await this.writeReminders([...existing, ...created]);

    const statuses = await this.submitAll(created);
    await this.updateStatuses(statuses);
    const failed = created.filter(r => statuses.get(r.id) === 'pending').map(r => r.id);

    return {
      submitted: created.map(r => ({ ...r, status: statuses.get(r.id) ?? r.status })),
      failed,
    };
  }

  private async updateStatuses(statuses: Map<string, ScheduledReminder['status']>): Promise<void> {
    if (statuses.size === 0) return;
    const reminders = await this.readReminders();
    await this.writeReminders(reminders.map(r => ({ ...r, status: statuses.get(r.id) ?? r.status })));
  }

  /**
   * Submit every reminder once. If any fail, wait the retry delay once and
   * retry only those that are not yet due.
   */
  private async submitAll(reminders: readonly ScheduledReminder[]): Promise<Map<string, ScheduledReminder['status']>> {
    const statuses = new Map<string, ScheduledReminder['status']>();
    const retry: ScheduledReminder[] = [];

    for (const reminder of reminders) {
      try {
        await this.delivery.submit(toDeliveryRequest(reminder));
        statuses.set(reminder.id, 'submitted');
      } catch (err) {
        console.error('Reminder submission failed, retrying', { id: reminder.id, err: String(err) });
        statuses.set(reminder.id, 'pending');
        retry.push(reminder);
      }
    }
    if (retry.length === 0) return statuses;

    await this.sleep(this.retryDelayMs);
    const now = this.now().getTime();
    for (const reminder of retry) {
      if (new Date(reminder.fire_at).getTime() <= now) continue;
      try {
        await this.delivery.submit(toDeliveryRequest(reminder));
        statuses.set(reminder.id, 'submitted');
      } catch (err) {
        console.error('Reminder submission failed after retry', { id: reminder.id, err: String(err) });
      }
    }
    return statuses;
  }
}

function toDeliveryRequest(reminder: ScheduledReminder): DeliveryRequest {
  return {
    id: reminder.id,
    fireAt: new Date(reminder.fire_at),
    title: reminder.title,
    body: reminder.body,
    metadata: {
      location_id: reminder.location_id,
      rule_id: reminder.rule_id,
      preference_id: reminder.preference_id,
      occurrence_start: reminder.occurrence_start,
      ...(reminder.device_token ? { device_token: reminder.device_token } : {}),
    },
  };
}
