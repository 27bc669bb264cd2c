import { z } from 'zod';

// Enums
export enum Weekday {
  SUN = 1,
  MON = 2,
  TUE = 3,
  WED = 4,
  THU = 5,
  FRI = 6,
  SAT = 7,
}

export const WEEKDAY_LOOKUP: Record<string, Weekday> = {
  'sun': Weekday.SUN,
  'sunday': Weekday.SUN,
  'mon': Weekday.MON,
  'monday': Weekday.MON,
  'tues': Weekday.TUE,
  'tue': Weekday.TUE,
  'tuesday': Weekday.TUE,
  'wed': Weekday.WED,
  'weds': Weekday.WED,
  'wednesday': Weekday.WED,
  'thu': Weekday.THU,
  'thur': Weekday.THU,
  'thurs': Weekday.THU,
  'thursday': Weekday.THU,
  'fri': Weekday.FRI,
  'friday': Weekday.FRI,
  'sat': Weekday.SAT,
  'saturday': Weekday.SAT,
};

export function parseWeekday(label: string | null | undefined): Weekday | null {
  const key = (label || '').trim().toLowerCase();
  return WEEKDAY_LOOKUP[key] ?? null;
}

/**
 * Convert a JavaScript day index (0 = Sunday) to our Weekday (1 = Sunday).
 */
const JS_DAY_ORDER = [
  Weekday.SUN,
  Weekday.MON,
  Weekday.TUE,
  Weekday.WED,
  Weekday.THU,
  Weekday.FRI,
  Weekday.SAT,
] as const;

export function weekdayFromJsDay(jsDay: number): Weekday {
  return JS_DAY_ORDER[((jsDay % 7) + 7) % 7] ?? Weekday.SUN;
}

export const STREET_SIDES = ['North', 'South', 'East', 'West'] as const;
export type StreetSide = typeof STREET_SIDES[number];

// Types
export type Coord = [number, number];  // [lon, lat]

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

// Schemas
export const CitationStatsSchema = z.object({
  count: z.number(),
  avg_hour: z.number().nullable(),
  min_hour: z.number().nullable(),
  max_hour: z.number().nullable(),
});
export type CitationStats = z.infer<typeof CitationStatsSchema>;

export const ScheduleRuleSchema = z.object({
  id: z.string().min(1),
  cnn: z.string(),
  corridor: z.string(),
  limits: z.string(),
  cnn_right_left: z.string(),
  block_side: z.string(),
  full_name: z.string(),
  weekday: z.nativeEnum(Weekday),
  from_hour: z.number().int().min(0).max(23),
  to_hour: z.number().int().min(0).max(23),
  week1: z.boolean(),
  week2: z.boolean(),
  week3: z.boolean(),
  week4: z.boolean(),
  week5: z.boolean(),
  holidays: z.boolean(),
  line: z.array(z.tuple([z.number(), z.number()])).min(2),
  citations: CitationStatsSchema.optional(),
});
export type ScheduleRule = z.infer<typeof ScheduleRuleSchema>;

/**
 * Week-of-month flags of a rule as an ordered list of active week numbers (1-5).
 */
export function activeWeeks(rule: Pick<ScheduleRule, 'week1' | 'week2' | 'week3' | 'week4' | 'week5'>): number[] {
  const weeks: number[] = [];
  if (rule.week1) weeks.push(1);
  if (rule.week2) weeks.push(2);
  if (rule.week3) weeks.push(3);
  if (rule.week4) weeks.push(4);
  if (rule.week5) weeks.push(5);
  return weeks;
}

export interface Occurrence {
  start: Date;
  end: Date;
  date: string;         // YYYY-MM-DD in the schedule's time zone
  weekOfMonth: number;  // 1-5, nth appearance of the weekday in its month
}

export const PRESET_TIMINGS = [
  'week_before',
  'three_days_before',
  'day_before',
  'morning_of',
  'two_hours_before',
  'one_hour_before',
  'thirty_minutes',
  'fifteen_minutes',
  'five_minutes',
  'at_cleaning_time',
  'after_cleaning',
] as const;
export const PresetTimingSchema = z.enum(PRESET_TIMINGS);
export type PresetTiming = z.infer<typeof PresetTimingSchema>;

export const TimeUnitSchema = z.enum(['minutes', 'hours', 'days', 'weeks']);
export type TimeUnit = z.infer<typeof TimeUnitSchema>;

export const ReminderAnchorSchema = z.enum(['before', 'after']);
export type ReminderAnchor = z.infer<typeof ReminderAnchorSchema>;

export const TimeOfDaySchema = z.object({
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
});
export type TimeOfDay = z.infer<typeof TimeOfDaySchema>;

export const ReminderTimingSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('preset'),
    preset: PresetTimingSchema,
  }),
  z.object({
    kind: z.literal('custom'),
    amount: z.number().int().min(0),
    unit: TimeUnitSchema,
    anchor: ReminderAnchorSchema,
    time_of_day: TimeOfDaySchema.nullable().default(null),
  }),
]);
export type ReminderTiming = z.infer<typeof ReminderTimingSchema>;
export type CustomTiming = Extract<ReminderTiming, { kind: 'custom' }>;

export const ReminderPreferenceSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  message: z.string().nullable(),
  timing: ReminderTimingSchema,
  is_active: z.boolean(),
  created_at: z.string(),
});
export type ReminderPreference = z.infer<typeof ReminderPreferenceSchema>;

export const ScheduledReminderSchema = z.object({
  id: z.string(),
  location_id: z.string(),
  rule_id: z.string(),
  preference_id: z.string(),
  occurrence_start: z.string(),  // ISO8601
  occurrence_end: z.string(),
  fire_at: z.string(),
  title: z.string(),
  body: z.string(),
  status: z.enum(['pending', 'submitted']),
  device_token: z.string().nullable(),
});
export type ScheduledReminder = z.infer<typeof ScheduledReminderSchema>;

// Binding of a saved location to its resolved rule and the occurrence reminders were built for
export const LocationPlanSchema = z.object({
  location_id: z.string(),
  label: z.string().nullable(),
  rule: ScheduleRuleSchema,
  side: z.enum(STREET_SIDES),
  occurrence_start: z.string(),
  occurrence_end: z.string(),
  device_token: z.string().nullable(),
  updated_at: z.string(),
});
export type LocationPlan = z.infer<typeof LocationPlanSchema>;
