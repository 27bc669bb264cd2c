import { DeliverySubmissionError } from '../../shared/errors';
import type { DeliveryRequest, ReminderDelivery } from './delivery';

/**
 * Records submissions and reports them as pending until cancelled. Set
 * `failNext` to make the next submissions throw.
 */
export class FakeDelivery implements ReminderDelivery {
  readonly pending = new Map<string, DeliveryRequest>();
  readonly submissions: DeliveryRequest[] = [];
  failNext = 0;

  async submit(request: DeliveryRequest): Promise<void> {
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new DeliverySubmissionError('collaborator unavailable', request.id);
    }
    this.submissions.push(request);
    this.pending.set(request.id, request);
  }

  async pendingIds(): Promise<string[]> {
    return [...this.pending.keys()];
  }

  async cancel(ids: readonly string[]): Promise<void> {
    for (const id of ids) this.pending.delete(id);
  }
}
