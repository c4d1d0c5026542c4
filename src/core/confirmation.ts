/**
 * Confirmation Gate — the human in the loop
 *
 * One method: confirm(plan, verdict) => Promise<boolean>
 *
 * Each call opens a ConfirmationRequest in state PENDING, hands it to the
 * channel, and settles it as CONFIRMED or DECLINED. There is no timeout:
 * the request stays pending until the channel answers.
 *
 * An empty step list is declined without asking. The channel sees a frozen
 * copy of the gated steps; what it does to the request never reaches the
 * router.
 */

import { v4 as uuidv4 } from 'uuid';
import { ConfirmationDeclined, errorMessage } from './errors.js';
import { logTag } from './log.js';
import type { GatedStep, Plan, ValidationVerdict } from './types.js';

export type ConfirmationState = 'PENDING' | 'CONFIRMED' | 'DECLINED';

export interface ConfirmationRequest {
  id: string;
  narrative: string;
  readonly steps: readonly GatedStep[];
  readonly warnings: readonly string[];
}

export interface ChannelResponse {
  approved: boolean;
  reason?: string;
}

export interface ConfirmationChannel {
  name: string;
  ask(request: ConfirmationRequest): Promise<ChannelResponse>;
}

/**
 * A single pending decision. Settles once; later transitions are ignored.
 */
export class PendingConfirmation {
  private current: ConfirmationState = 'PENDING';
  private declineReason?: string;

  constructor(readonly request: ConfirmationRequest) {}

  get state(): ConfirmationState {
    return this.current;
  }

  confirm(): void {
    if (this.current !== 'PENDING') return;
    this.current = 'CONFIRMED';
  }

  decline(reason: string): void {
    if (this.current !== 'PENDING') return;
    this.current = 'DECLINED';
    this.declineReason = reason;
  }

  /** The decline as an error value, or null when confirmed or still pending. */
  get declined(): ConfirmationDeclined | null {
    if (this.current !== 'DECLINED') return null;
    return new ConfirmationDeclined(this.request.id, this.declineReason ?? 'Declined');
  }
}

export class ConfirmationGate {
  constructor(private channel: ConfirmationChannel) {}

  async confirm(plan: Plan, verdict: ValidationVerdict): Promise<boolean> {
    const pending = await this.decide(plan, verdict);
    return pending.state === 'CONFIRMED';
  }

  /** Like confirm(), but returns the settled request so callers can read the decline reason. */
  async decide(plan: Plan, verdict: ValidationVerdict): Promise<PendingConfirmation> {
    const pending = new PendingConfirmation(Object.freeze({
      id: `cf_${uuidv4().replace(/-/g, '').slice(0, 12)}`,
      narrative: plan.narrative,
      steps: Object.freeze(verdict.steps.map((gated) => Object.freeze({ ...gated }))),
      warnings: Object.freeze([...verdict.warnings]),
    }));

    if (verdict.status === 'REJECT') {
      pending.decline(verdict.reason ?? 'Plan rejected');
      return pending;
    }

    if (verdict.steps.length === 0) {
      pending.decline('Nothing left to run after safety checks');
      logTag('confirm', `${pending.request.id} -> auto-declined (no steps)`);
      return pending;
    }

    let response: ChannelResponse;
    try {
      response = await this.channel.ask(pending.request);
    } catch (err) {
      response = { approved: false, reason: `Channel error: ${errorMessage(err)}` };
    }

    if (response.approved === true) {
      pending.confirm();
    } else {
      pending.decline(response.reason || 'Declined by user');
    }

    logTag('confirm', `${pending.request.id} via ${this.channel.name} -> ${pending.state}`);
    return pending;
  }
}
