import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { MemoryStore } from '../../shared/storage';
import { makeRule } from '../../shared/test-helpers';
import type { ReminderSchedulerOptions } from './scheduler';
import { ReminderScheduler } from './scheduler';
import { FakeDelivery } from './test-helpers';

const TZ = 'America/Los_Angeles';
// First Monday of January 2025 is the 6th; 8am PST is 16:00Z
const FIRST_START = '2025-01-06T16:00:00.000Z';

describe('ReminderScheduler', () => {
  let store: MemoryStore;
  let delivery: FakeDelivery;
  let now: Date;
  let sleep: Mock<(ms: number) => Promise<void>>;

  function createScheduler(overrides: Partial<ReminderSchedulerOptions> = {}): ReminderScheduler {
    let counter = 0;
    return new ReminderScheduler({
      store,
      delivery,
      timeZone: TZ,
      now: () => now,
      generateId: () => `pref-${++counter}`,
      sleep,
      ...overrides,
    });
  }

  function idFor(preferenceId: string, start = FIRST_START, locationId = 'loc-1'): string {
    return `${locationId}_sweep-1_${start}_${preferenceId}`;
  }

  beforeEach(() => {
    store = new MemoryStore();
    delivery = new FakeDelivery();
    now = new Date('2025-01-01T12:00:00Z');
    sleep = vi.fn(async (_ms: number) => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('preferences', () => {
    it('adds a preference titled after its timing', async () => {
      const scheduler = createScheduler();
      const result = await scheduler.addPreference({ timing: { kind: 'preset', preset: 'one_hour_before' } });

      expect(result).toEqual({
        status: 'added',
        preference: {
          id: 'pref-1',
          title: '1 Hour Before',
          message: null,
          timing: { kind: 'preset', preset: 'one_hour_before' },
          is_active: true,
          created_at: '2025-01-01T12:00:00.000Z',
        },
      });
      expect(await scheduler.listPreferences()).toHaveLength(1);
    });

    it('treats a preset and its custom equivalent as duplicates unless forced', async () => {
      const scheduler = createScheduler();
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'thirty_minutes' } });

      const duplicate = await scheduler.addPreference({
        timing: { kind: 'custom', amount: 30, unit: 'minutes', anchor: 'before', time_of_day: null },
      });
      expect(duplicate.status).toBe('duplicate');
      expect(duplicate.status === 'duplicate' && duplicate.existing.id).toBe('pref-1');

      const forced = await scheduler.addPreference(
        { timing: { kind: 'custom', amount: 30, unit: 'minutes', anchor: 'before', time_of_day: null } },
        { force: true },
      );
      expect(forced.status).toBe('added');
      expect(await scheduler.listPreferences()).toHaveLength(2);
    });

    it('checks the cap before duplicates', async () => {
      const scheduler = createScheduler({ maxPreferences: 1 });
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'thirty_minutes' } });

      const result = await scheduler.addPreference({ timing: { kind: 'preset', preset: 'thirty_minutes' } });
      expect(result).toEqual({ status: 'max_reached', limit: 1 });
    });

    it('does not count inactive preferences as duplicates', async () => {
      const scheduler = createScheduler();
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'morning_of' }, is_active: false });

      const result = await scheduler.addPreference({ timing: { kind: 'preset', preset: 'morning_of' } });
      expect(result.status).toBe('added');
    });

    it('serializes concurrent adds', async () => {
      const scheduler = createScheduler();
      const timing = { kind: 'preset', preset: 'five_minutes' } as const;

      const results = await Promise.all([scheduler.addPreference({ timing }), scheduler.addPreference({ timing })]);

      expect(results.map(r => r.status)).toEqual(['added', 'duplicate']);
      expect(await scheduler.listPreferences()).toHaveLength(1);
    });

    it('updates title, message and timing', async () => {
      const scheduler = createScheduler();
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'one_hour_before' } });

      const result = await scheduler.updatePreference('pref-1', {
        title: 'Heads up',
        message: 'Move it',
        timing: { kind: 'preset', preset: 'two_hours_before' },
      });

      expect(result.status === 'updated' && result.preference).toMatchObject({
        id: 'pref-1',
        title: 'Heads up',
        message: 'Move it',
        timing: { kind: 'preset', preset: 'two_hours_before' },
      });
      expect(await scheduler.updatePreference('missing', { title: 'x' })).toEqual({ status: 'not_found' });
    });

    it('creates the default preferences only once', async () => {
      const scheduler = createScheduler();

      const defaults = await scheduler.ensureDefaultPreferences();
      expect(defaults.map(p => p.title)).toEqual(['Evening Before', 'Morning Of', '30 Minutes Before']);

      for (const preference of defaults) {
        await scheduler.removePreference(preference.id);
      }
      expect(await scheduler.ensureDefaultPreferences()).toEqual([]);
    });
  });

  describe('locations', () => {
    async function withTwoPreferences(scheduler: ReminderScheduler): Promise<void> {
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'one_hour_before' } });
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'thirty_minutes' } });
    }

    it('schedules one reminder per active preference for the next occurrence', async () => {
      const scheduler = createScheduler();
      await withTwoPreferences(scheduler);

      const result = await scheduler.applyToLocation({
        locationId: 'loc-1',
        rule: makeRule(),
        side: 'North',
        deviceToken: 'device-1',
      });

      expect(result.failed).toEqual([]);
      expect(result.plan?.occurrence_start).toBe(FIRST_START);
      expect(result.reminders.map(r => [r.id, r.fire_at, r.status])).toEqual([
        [idFor('pref-1'), '2025-01-06T15:00:00.000Z', 'submitted'],
        [idFor('pref-2'), '2025-01-06T15:30:00.000Z', 'submitted'],
      ]);
      expect(result.reminders[0]?.body).toBe(
        'Street cleaning starts soon - time to move your car! Main St (100-200) - North side: 8:00 AM - 10:00 AM',
      );
      expect(delivery.submissions[0]?.metadata).toEqual({
        location_id: 'loc-1',
        rule_id: 'sweep-1',
        preference_id: 'pref-1',
        occurrence_start: FIRST_START,
        device_token: 'device-1',
      });
      expect(await scheduler.listReminders('loc-1')).toHaveLength(2);
    });

    it('yields the same reminders when applied twice', async () => {
      const scheduler = createScheduler();
      await withTwoPreferences(scheduler);
      const input = { locationId: 'loc-1', rule: makeRule(), side: 'North' } as const;

      const first = await scheduler.applyToLocation(input);
      const second = await scheduler.applyToLocation(input);

      expect(second.reminders.map(r => r.id)).toEqual(first.reminders.map(r => r.id));
      expect((await delivery.pendingIds()).sort()).toEqual([idFor('pref-1'), idFor('pref-2')]);
      expect(await scheduler.listReminders()).toHaveLength(2);
    });

    it('cancels the previous reminders of a location before scheduling new ones', async () => {
      const scheduler = createScheduler();
      await withTwoPreferences(scheduler);
      await scheduler.applyToLocation({ locationId: 'loc-1', rule: makeRule(), side: 'North' });

      const later = makeRule({ week1: false });
      await scheduler.applyToLocation({ locationId: 'loc-1', rule: later, side: 'North' });

      const third = '2025-01-20T16:00:00.000Z';
      expect((await delivery.pendingIds()).sort()).toEqual([idFor('pref-1', third), idFor('pref-2', third)]);
    });

    it('skips reminders whose fire time has already passed', async () => {
      now = new Date('2025-01-06T15:10:00Z');
      const scheduler = createScheduler();
      await withTwoPreferences(scheduler);

      const result = await scheduler.applyToLocation({ locationId: 'loc-1', rule: makeRule(), side: 'North' });
      expect(result.reminders.map(r => r.id)).toEqual([idFor('pref-2')]);
    });

    it('stores no plan when the rule never recurs', async () => {
      const scheduler = createScheduler();
      await withTwoPreferences(scheduler);

      const result = await scheduler.applyToLocation({
        locationId: 'loc-1',
        rule: makeRule({ week1: false, week3: false }),
        side: 'North',
      });

      expect(result).toEqual({ plan: null, reminders: [], failed: [] });
      expect(await scheduler.getLocationPlan('loc-1')).toBeNull();
    });

    it('clears a location', async () => {
      const scheduler = createScheduler();
      await withTwoPreferences(scheduler);
      await scheduler.applyToLocation({ locationId: 'loc-1', rule: makeRule(), side: 'North' });

      expect(await scheduler.clearLocation('loc-1')).toBe(2);
      expect(await delivery.pendingIds()).toEqual([]);
      expect(await scheduler.getLocationPlan('loc-1')).toBeNull();
      expect(await scheduler.listReminders()).toEqual([]);
    });

    it('cancels the reminders of a removed preference', async () => {
      const scheduler = createScheduler();
      await withTwoPreferences(scheduler);
      await scheduler.applyToLocation({ locationId: 'loc-1', rule: makeRule(), side: 'North' });

      expect(await scheduler.removePreference('pref-1')).toBe(true);

      expect(await delivery.pendingIds()).toEqual([idFor('pref-2')]);
      expect((await scheduler.listReminders()).map(r => r.preference_id)).toEqual(['pref-2']);
      expect(await scheduler.removePreference('pref-1')).toBe(false);
    });

    it('cancels and restores reminders when a preference is toggled', async () => {
      const scheduler = createScheduler();
      await withTwoPreferences(scheduler);
      await scheduler.applyToLocation({ locationId: 'loc-1', rule: makeRule(), side: 'North' });

      await scheduler.setPreferenceActive('pref-2', false);
      expect(await delivery.pendingIds()).toEqual([idFor('pref-1')]);

      await scheduler.setPreferenceActive('pref-2', true);
      expect((await delivery.pendingIds()).sort()).toEqual([idFor('pref-1'), idFor('pref-2')]);
    });

    it('schedules a newly added preference for existing locations', async () => {
      const scheduler = createScheduler();
      await scheduler.applyToLocation({ locationId: 'loc-1', rule: makeRule(), side: 'North' });
      expect(await scheduler.listReminders()).toEqual([]);

      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'fifteen_minutes' } });

      expect(await scheduler.listReminders()).toMatchObject([
        { id: idFor('pref-1'), fire_at: '2025-01-06T15:45:00.000Z', status: 'submitted' },
      ]);
    });
  });

  describe('submission', () => {
    it('retries a failed submission once after the retry delay', async () => {
      const scheduler = createScheduler();
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'one_hour_before' } });
      delivery.failNext = 1;

      const result = await scheduler.applyToLocation({ locationId: 'loc-1', rule: makeRule(), side: 'North' });

      expect(sleep).toHaveBeenCalledWith(1000);
      expect(result.failed).toEqual([]);
      expect(result.reminders[0]?.status).toBe('submitted');
    });

    it('waits the retry delay once for several failed submissions', async () => {
      const scheduler = createScheduler();
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'one_hour_before' } });
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'thirty_minutes' } });
      delivery.failNext = 2;

      const result = await scheduler.applyToLocation({ locationId: 'loc-1', rule: makeRule(), side: 'North' });

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(result.failed).toEqual([]);
      expect(result.reminders.map(r => r.status)).toEqual(['submitted', 'submitted']);
      expect(delivery.pending.size).toBe(2);
    });

    it('keeps reminders pending when the retry fails too', async () => {
      const scheduler = createScheduler();
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'one_hour_before' } });
      delivery.failNext = 2;

      const result = await scheduler.applyToLocation({ locationId: 'loc-1', rule: makeRule(), side: 'North' });

      expect(result.failed).toEqual([idFor('pref-1')]);
      expect((await scheduler.listReminders())[0]?.status).toBe('pending');

      const reconciled = await scheduler.reconcile();
      expect(reconciled).toEqual({ dropped: 0, resubmitted: 1, failed: 0, rolled_forward: 0 });
      expect((await scheduler.listReminders())[0]?.status).toBe('submitted');
    });
  });

  describe('reconcile', () => {
    async function scheduled(): Promise<ReminderScheduler> {
      const scheduler = createScheduler();
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'one_hour_before' } });
      await scheduler.addPreference({ timing: { kind: 'preset', preset: 'thirty_minutes' } });
      await scheduler.applyToLocation({ locationId: 'loc-1', rule: makeRule(), side: 'North' });
      return scheduler;
    }

    it('re-submits reminders the collaborator lost', async () => {
      await scheduled();
      delivery = new FakeDelivery();
      const restarted = createScheduler();

      const result = await restarted.reconcile();

      expect(result).toEqual({ dropped: 0, resubmitted: 2, failed: 0, rolled_forward: 0 });
      expect((await delivery.pendingIds()).sort()).toEqual([idFor('pref-1'), idFor('pref-2')]);
    });

    it('drops reminders whose fire time has passed', async () => {
      const scheduler = await scheduled();
      now = new Date('2025-01-06T15:15:00Z');

      const result = await scheduler.reconcile();

      expect(result).toEqual({ dropped: 1, resubmitted: 0, failed: 0, rolled_forward: 0 });
      expect((await scheduler.listReminders()).map(r => r.id)).toEqual([idFor('pref-2')]);
    });

    it('moves a location on to its next occurrence once the current one started', async () => {
      const scheduler = await scheduled();
      now = new Date('2025-01-06T16:30:00Z');

      const result = await scheduler.reconcile();

      const third = '2025-01-20T16:00:00.000Z';
      expect(result).toEqual({ dropped: 2, resubmitted: 2, failed: 0, rolled_forward: 1 });
      expect((await scheduler.getLocationPlan('loc-1'))?.occurrence_start).toBe(third);
      expect((await scheduler.listReminders()).map(r => [r.id, r.fire_at])).toEqual([
        [idFor('pref-1', third), '2025-01-20T15:00:00.000Z'],
        [idFor('pref-2', third), '2025-01-20T15:30:00.000Z'],
      ]);
    });

    it('changes nothing when everything is in place', async () => {
      const scheduler = await scheduled();
      const before = await scheduler.listReminders();

      expect(await scheduler.reconcile()).toEqual({ dropped: 0, resubmitted: 0, failed: 0, rolled_forward: 0 });
      expect(await scheduler.listReminders()).toEqual(before);
    });
  });
});
