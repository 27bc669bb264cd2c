import type { ScheduleRule } from './models';
import { Weekday } from './models';

/**
 * A Monday 8am-10am rule on an east-west block; override what the test cares about.
 */
export function makeRule(overrides: Partial<ScheduleRule> = {}): ScheduleRule {
  return {
    id: 'sweep-1',
    cnn: '1001',
    corridor: 'Main St',
    limits: '100-200',
    cnn_right_left: 'L',
    block_side: 'North',
    full_name: 'Monday',
    weekday: Weekday.MON,
    from_hour: 8,
    to_hour: 10,
    week1: true,
    week2: false,
    week3: true,
    week4: false,
    week5: false,
    holidays: false,
    line: [
      [-122.42, 37.77],
      [-122.419, 37.77],
    ],
    ...overrides,
  };
}
