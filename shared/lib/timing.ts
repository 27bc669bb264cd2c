import type {
  CustomTiming,
  Occurrence,
  PresetTiming,
  ReminderAnchor,
  ReminderPreference,
  ReminderTiming,
  ScheduleRule,
  ScheduledReminder,
  TimeOfDay,
} from '../models';
import { addCalendarDays, atTimeOfDay } from './timezone';

/**
 * Street cleaning has no reliable end time in the source data, so "after cleaning"
 * timings count from start + this many minutes.
 */
export const DEFAULT_CLEANING_DURATION_MINUTES = 120;

const MINUTE_MS = 60 * 1000;

function custom(
  amount: number,
  unit: CustomTiming['unit'],
  anchor: ReminderAnchor = 'before',
  time_of_day: TimeOfDay | null = null,
): CustomTiming {
  return { kind: 'custom', amount, unit, anchor, time_of_day };
}

// Every preset is a fixed custom timing
const PRESET_EQUIVALENTS: Record<PresetTiming, CustomTiming> = {
  week_before: custom(1, 'weeks'),
  three_days_before: custom(3, 'days'),
  day_before: custom(1, 'days', 'before', { hour: 20, minute: 0 }),
  morning_of: custom(0, 'days', 'before', { hour: 8, minute: 0 }),
  two_hours_before: custom(2, 'hours'),
  one_hour_before: custom(1, 'hours'),
  thirty_minutes: custom(30, 'minutes'),
  fifteen_minutes: custom(15, 'minutes'),
  five_minutes: custom(5, 'minutes'),
  at_cleaning_time: custom(0, 'minutes'),
  after_cleaning: custom(0, 'minutes', 'after'),
};

export function toCustomTiming(timing: ReminderTiming): CustomTiming {
  return timing.kind === 'preset' ? PRESET_EQUIVALENTS[timing.preset] : timing;
}

function shift(base: Date, amount: number, unit: CustomTiming['unit'], timeZone: string): Date {
  switch (unit) {
    case 'minutes':
      return new Date(base.getTime() + amount * MINUTE_MS);
    case 'hours':
      return new Date(base.getTime() + amount * 60 * MINUTE_MS);
    case 'days':
      return addCalendarDays(base, amount, timeZone);
    case 'weeks':
      return addCalendarDays(base, amount * 7, timeZone);
  }
}

export interface TimingOptions {
  timeZone: string;
  cleaningDurationMinutes?: number;
}

/**
 * Instant a reminder with this timing fires for a cleaning that starts at `start`.
 *
 * Minute and hour offsets are absolute durations. Day and week offsets move the
 * calendar date and keep the wall-clock time in the zone, so "1 day before" an
 * 8am start is 8am the previous day even across a DST change. A time of day then
 * replaces the clock time on whatever date was reached.
 */
export function fireInstant(start: Date, timing: ReminderTiming, options: TimingOptions): Date {
  const { amount, unit, anchor, time_of_day } = toCustomTiming(timing);
  const duration = options.cleaningDurationMinutes ?? DEFAULT_CLEANING_DURATION_MINUTES;

  const base = anchor === 'before' ? start : new Date(start.getTime() + duration * MINUTE_MS);
  const sign = anchor === 'before' ? -1 : 1;

  let fire = shift(base, sign * amount, unit, options.timeZone);

  if (time_of_day) {
    fire = atTimeOfDay(fire, time_of_day.hour, time_of_day.minute, options.timeZone);
  }
  return fire;
}

export interface NormalizedTiming {
  anchor: ReminderAnchor;
  amount: number;
  unit: 'minutes' | 'days';
  time: string | null;  // HH:MM
}

/**
 * Canonical form used to detect duplicate preferences: presets become their
 * custom equivalents, hours fold into minutes, weeks into days, and a zero
 * offset counts as zero minutes whatever its unit.
 */
export function normalizeTiming(timing: ReminderTiming): NormalizedTiming {
  const { amount, unit, anchor, time_of_day } = toCustomTiming(timing);
  const time = time_of_day
    ? `${String(time_of_day.hour).padStart(2, '0')}:${String(time_of_day.minute).padStart(2, '0')}`
    : null;

  if (amount === 0) {
    return { anchor, amount: 0, unit: 'minutes', time };
  }
  switch (unit) {
    case 'minutes':
      return { anchor, amount, unit: 'minutes', time };
    case 'hours':
      return { anchor, amount: amount * 60, unit: 'minutes', time };
    case 'days':
      return { anchor, amount, unit: 'days', time };
    case 'weeks':
      return { anchor, amount: amount * 7, unit: 'days', time };
  }
}

export function timingKey(timing: ReminderTiming): string {
  const n = normalizeTiming(timing);
  return `${n.anchor}:${n.amount}:${n.unit}:${n.time ?? '-'}`;
}

export function sameTiming(a: ReminderTiming, b: ReminderTiming): boolean {
  return timingKey(a) === timingKey(b);
}

/**
 * Stable identifier of one reminder, so recomputing the same location, rule,
 * occurrence and preference always yields the same id.
 */
export function reminderId(locationId: string, ruleId: string, occurrenceStart: Date, preferenceId: string): string {
  return `${locationId}_${ruleId}_${occurrenceStart.toISOString()}_${preferenceId}`;
}

export function defaultMessage(timing: ReminderTiming): string {
  if (timing.kind === 'custom') {
    return timing.anchor === 'after'
      ? 'Street cleaning is done - you can park again!'
      : 'Parking reminder - check your street cleaning schedule!';
  }

  switch (timing.preset) {
    case 'week_before':
    case 'three_days_before':
    case 'day_before':
      return "Don't forget - street cleaning is coming up!";
    case 'morning_of':
      return 'Street cleaning today - move your car!';
    case 'two_hours_before':
    case 'one_hour_before':
      return 'Street cleaning starts soon - time to move your car!';
    case 'thirty_minutes':
    case 'fifteen_minutes':
    case 'five_minutes':
      return 'Move your car now - street cleaning starts soon!';
    case 'at_cleaning_time':
      return 'Street cleaning is starting now!';
    case 'after_cleaning':
      return 'Street cleaning is done - you can park again!';
  }
}

export interface ComputeRemindersInput {
  locationId: string;
  rule: ScheduleRule;
  occurrence: Occurrence;
  preferences: readonly ReminderPreference[];
  now: Date;
  timeZone: string;
  cleaningDurationMinutes?: number;
  deviceToken?: string | null;
  describe?: (preference: ReminderPreference, fireAt: Date) => { title: string; body: string };
}

/**
 * Reminders for one occurrence, one per active preference whose fire instant is
 * still in the future, soonest first.
 */
export function computeReminders(input: ComputeRemindersInput): ScheduledReminder[] {
  const { locationId, rule, occurrence, now } = input;
  const reminders: ScheduledReminder[] = [];

  for (const preference of input.preferences) {
    if (!preference.is_active) continue;

    const fireAt = fireInstant(occurrence.start, preference.timing, {
      timeZone: input.timeZone,
      cleaningDurationMinutes: input.cleaningDurationMinutes,
    });
    if (fireAt.getTime() <= now.getTime()) continue;

    const content = input.describe
      ? input.describe(preference, fireAt)
      : { title: preference.title, body: preference.message ?? defaultMessage(preference.timing) };

    reminders.push({
      id: reminderId(locationId, rule.id, occurrence.start, preference.id),
      location_id: locationId,
      rule_id: rule.id,
      preference_id: preference.id,
      occurrence_start: occurrence.start.toISOString(),
      occurrence_end: occurrence.end.toISOString(),
      fire_at: fireAt.toISOString(),
      title: content.title,
      body: content.body,
      status: 'pending',
      device_token: input.deviceToken ?? null,
    });
  }

  return reminders.sort((a, b) => Date.parse(a.fire_at) - Date.parse(b.fire_at));
}
