import type { NearbyMatch, ResolvedMatch } from '../shared/catalog';
import type { LocationPlan, Occurrence, ScheduledReminder } from '../shared/models';
import { formatDistance, formatLocation, formatRule } from '../shared/lib/formatting';
import { formatZonedTime } from '../shared/lib/timezone';

export function serializeOccurrence(occurrence: Occurrence, timeZone: string) {
  return {
    start: formatZonedTime(occurrence.start, timeZone),
    end: formatZonedTime(occurrence.end, timeZone),
    date: occurrence.date,
    week_of_month: occurrence.weekOfMonth,
  };
}

/**
 * Response shape of a resolved schedule. `in_progress` is the restriction window
 * covering `now`, if there is one.
 */
export function serializeMatch(match: ResolvedMatch, inProgress: Occurrence | null, now: Date, timeZone: string) {
  const { rule, nextOccurrence } = match;
  return {
    id: rule.id,
    corridor: rule.corridor,
    limits: rule.limits,
    block_side: rule.block_side,
    side: match.side,
    distance_meters: Math.round(match.distanceMeters * 10) / 10,
    human_rule: formatRule(rule),
    location: formatLocation(rule),
    next_sweep_start: nextOccurrence ? formatZonedTime(nextOccurrence.start, timeZone) : null,
    next_sweep_end: nextOccurrence ? formatZonedTime(nextOccurrence.end, timeZone) : null,
    next_sweep_relative: nextOccurrence ? formatDistance(nextOccurrence.start, now) : null,
    in_progress: inProgress ? serializeOccurrence(inProgress, timeZone) : null,
  };
}

export function serializeNearby(match: NearbyMatch, inProgress: Occurrence | null, now: Date, timeZone: string) {
  return { ...serializeMatch(match, inProgress, now, timeZone), is_user_side: match.isUserSide };
}

export function serializeReminder(reminder: ScheduledReminder, timeZone: string) {
  return {
    id: reminder.id,
    preference_id: reminder.preference_id,
    rule_id: reminder.rule_id,
    fire_at: formatZonedTime(new Date(reminder.fire_at), timeZone),
    occurrence_start: formatZonedTime(new Date(reminder.occurrence_start), timeZone),
    title: reminder.title,
    body: reminder.body,
    status: reminder.status,
  };
}

export function serializePlan(plan: LocationPlan, timeZone: string) {
  return {
    location_id: plan.location_id,
    label: plan.label,
    rule_id: plan.rule.id,
    side: plan.side,
    location: formatLocation(plan.rule),
    occurrence_start: formatZonedTime(new Date(plan.occurrence_start), timeZone),
    occurrence_end: formatZonedTime(new Date(plan.occurrence_end), timeZone),
  };
}
