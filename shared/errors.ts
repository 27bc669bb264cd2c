/**
 * The schedule table could not be read or has an unusable header.
 */
export class ScheduleTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScheduleTableError';
  }
}

/**
 * The delivery collaborator refused or failed to accept a reminder.
 */
export class DeliverySubmissionError extends Error {
  constructor(message: string, readonly reminderId: string) {
    super(message);
    this.name = 'DeliverySubmissionError';
  }
}
