import { DeliverySubmissionError } from '../../shared/errors';
import type { PushSender } from '../../shared/lib/fcm';

export interface DeliveryRequest {
  id: string;
  fireAt: Date;
  title: string;
  body: string;
  metadata: Record<string, string>;
}

/**
 * Whatever actually delivers reminders at their fire time. It is the source of
 * truth for what is still pending: an id it no longer reports has fired or was
 * cancelled.
 */
export interface ReminderDelivery {
  submit(request: DeliveryRequest): Promise<void>;
  pendingIds(): Promise<string[]>;
  cancel(ids: readonly string[]): Promise<void>;
}

// setTimeout clamps longer delays to 1ms
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

interface Alarm {
  request: DeliveryRequest;
  timer: NodeJS.Timeout;
}

/**
 * In-process alarms, one per reminder id. When an alarm fires its payload is
 * handed to the push sender; the device token travels in `metadata.device_token`.
 * Alarms do not survive a restart; the scheduler's reconcile pass re-submits them.
 */
export class AlarmDelivery implements ReminderDelivery {
  private readonly alarms = new Map<string, Alarm>();

  constructor(private readonly sender: PushSender) {}

  async submit(request: DeliveryRequest): Promise<void> {
    if (!Number.isFinite(request.fireAt.getTime()) || request.fireAt.getTime() <= Date.now()) {
      throw new DeliverySubmissionError(`Fire time ${request.fireAt.toISOString()} is not in the future`, request.id);
    }

    this.clear(request.id);
    this.arm(request);
  }

  async pendingIds(): Promise<string[]> {
    return [...this.alarms.keys()];
  }

  async cancel(ids: readonly string[]): Promise<void> {
    for (const id of ids) {
      this.clear(id);
    }
  }

  /**
   * Drop every alarm without sending.
   */
  close(): void {
    for (const id of [...this.alarms.keys()]) {
      this.clear(id);
    }
  }

  private arm(request: DeliveryRequest): void {
    const delay = Math.max(0, request.fireAt.getTime() - Date.now());
    const timer =
      delay > MAX_TIMER_DELAY_MS
        ? setTimeout(() => this.arm(request), MAX_TIMER_DELAY_MS)
        : setTimeout(() => {
            this.fire(request.id).catch(err => {
              console.error('Failed to send reminder', { id: request.id, err });
            });
          }, delay);
    timer.unref();
    this.alarms.set(request.id, { request, timer });
  }

  private clear(id: string): void {
    const alarm = this.alarms.get(id);
    if (!alarm) return;
    clearTimeout(alarm.timer);
    this.alarms.delete(id);
  }

  private async fire(id: string): Promise<void> {
    const alarm = this.alarms.get(id);
    if (!alarm) {
      console.error('Reminder alarm fired but no payload found', { id });
      return;
    }
    this.alarms.delete(id);

    const { request } = alarm;
    await this.sender.send({
      deviceToken: request.metadata.device_token ?? null,
      title: request.title,
      body: request.body,
      data: { ...request.metadata, reminder_id: request.id },
    });

    console.log('Reminder sent', { id, fireAt: request.fireAt.toISOString() });
  }
}
