import type { Occurrence, PresetTiming, ReminderPreference, ReminderTiming, ScheduleRule } from '../models';
import { Weekday, activeWeeks } from '../models';
import { defaultMessage } from './timing';
import { zonedParts } from './timezone';

/**
 * Format a Date as a clock time string in the given time zone.
 * Example: "2:30 PM"
 */
export function formatClockTime(date: Date, timeZone: string): string {
  const { hour, minute } = zonedParts(date, timeZone);
  const suffix = hour < 12 ? 'AM' : 'PM';
  const h12 = hour % 12 === 0 ? 12 : hour % 12;
  return `${h12}:${String(minute).padStart(2, '0')} ${suffix}`;
}

export const WEEKDAY_NAMES: Record<Weekday, string> = {
  [Weekday.SUN]: 'Sunday',
  [Weekday.MON]: 'Monday',
  [Weekday.TUE]: 'Tuesday',
  [Weekday.WED]: 'Wednesday',
  [Weekday.THU]: 'Thursday',
  [Weekday.FRI]: 'Friday',
  [Weekday.SAT]: 'Saturday',
};

const ORDINAL_NAMES: Record<number, string> = {
  1: '1st',
  2: '2nd',
  3: '3rd',
  4: '4th',
  5: '5th',
};

// Convert military time to AM/PM format
function formatHour(hour: number): string {
  if (hour === 0) return '12am';
  if (hour < 12) return `${hour}am`;
  if (hour === 12) return '12pm';
  return `${hour - 12}pm`;
}

/**
 * Convert a schedule rule to human-readable text.
 * Example: "Every 1st and 3rd Monday at 8am-10am"
 */
export function formatRule(rule: ScheduleRule): string {
  const weeks = activeWeeks(rule);
  const hours = `${formatHour(rule.from_hour)}-${formatHour(rule.to_hour)}`;
  const weekday = WEEKDAY_NAMES[rule.weekday];

  if (weeks.length === 0) {
    return `No scheduled ${weekday} sweeping`;
  }

  // Only show week prefix if it's not all weeks
  let weeksPrefix = '';
  if (weeks.length < 5) {
    const weekNames = weeks.map(w => ORDINAL_NAMES[w]);
    if (weekNames.length === 1) {
      weeksPrefix = `${weekNames[0]} `;
    } else if (weekNames.length === 2) {
      weeksPrefix = `${weekNames[0]} and ${weekNames[1]} `;
    } else {
      const last = weekNames[weekNames.length - 1];
      weeksPrefix = `${weekNames.slice(0, -1).join(', ')}, and ${last} `;
    }
  }

  return `Every ${weeksPrefix}${weekday} at ${hours}`;
}

/**
 * Example: "Main St (100 - 200) - North side"
 */
export function formatLocation(rule: ScheduleRule): string {
  const parts: string[] = [rule.corridor];
  if (rule.limits) parts.push(`(${rule.limits})`);
  if (rule.block_side) parts.push(`- ${rule.block_side} side`);
  return parts.join(' ');
}

/**
 * Rough distance from now to a future instant.
 * Example: "in 2 hours", "in 3 days", "now"
 */
export function formatDistance(target: Date, now: Date): string {
  const minutes = Math.round((target.getTime() - now.getTime()) / 60_000);
  if (minutes <= 0) return 'now';
  if (minutes < 60) return `in ${minutes} minute${minutes === 1 ? '' : 's'}`;

  const hours = Math.round(minutes / 60);
  if (hours < 24) return `in ${hours} hour${hours === 1 ? '' : 's'}`;

  const days = Math.round(hours / 24);
  return `in ${days} day${days === 1 ? '' : 's'}`;
}

const PRESET_LABELS: Record<PresetTiming, string> = {
  week_before: '1 Week Before',
  three_days_before: '3 Days Before',
  day_before: '1 Day Before',
  morning_of: 'Day Of',
  two_hours_before: '2 Hours Before',
  one_hour_before: '1 Hour Before',
  thirty_minutes: '30 Minutes Before',
  fifteen_minutes: '15 Minutes Before',
  five_minutes: '5 Minutes Before',
  at_cleaning_time: 'When Cleaning Starts',
  after_cleaning: 'After Cleaning Ends',
};

const UNIT_NAMES = {
  minutes: ['Minute', 'Minutes'],
  hours: ['Hour', 'Hours'],
  days: ['Day', 'Days'],
  weeks: ['Week', 'Weeks'],
} as const;

/**
 * Example: "2 Hours Before", "1 Day After", "On The Day"
 */
export function formatTiming(timing: ReminderTiming): string {
  if (timing.kind === 'preset') {
    return PRESET_LABELS[timing.preset];
  }
  if (timing.anchor === 'before' && timing.unit === 'days' && timing.amount === 0) {
    return 'On The Day';
  }
  const [singular, plural] = UNIT_NAMES[timing.unit];
  const amount = `${timing.amount} ${timing.amount === 1 ? singular : plural}`;
  return `${amount} ${timing.anchor === 'before' ? 'Before' : 'After'}`;
}

/**
 * Push title and body for one reminder of a location's occurrence.
 */
export function buildReminderContent(
  preference: ReminderPreference,
  rule: ScheduleRule,
  occurrence: Occurrence,
  timeZone: string,
): { title: string; body: string } {
  const message = preference.message ?? defaultMessage(preference.timing);
  const window = `${formatClockTime(occurrence.start, timeZone)} - ${formatClockTime(occurrence.end, timeZone)}`;
  return {
    title: preference.title,
    body: `${message} ${formatLocation(rule)}: ${window}`,
  };
}
