/**
 * Webhook Channel — HTTP POST to an external approver
 *
 * Body: { type: 'confirmation_request', request }
 * Expected reply: { approved: boolean, reason?: string }
 *
 * The request is not timed out; a webhook that never answers leaves the
 * turn pending, like an unanswered terminal prompt.
 */

import { errorMessage } from '../core/errors.js';
import type { ChannelResponse, ConfirmationChannel, ConfirmationRequest } from '../core/confirmation.js';

export class WebhookChannel implements ConfirmationChannel {
  name = 'webhook';

  constructor(private url: string, private secret?: string) {}

  async ask(request: ConfirmationRequest): Promise<ChannelResponse> {
    if (!this.url) {
      return { approved: false, reason: 'Webhook URL not configured' };
    }

    try {
      const res = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.secret ? { 'X-Deskpilot-Secret': this.secret } : {}),
        },
        body: JSON.stringify({ type: 'confirmation_request', request }),
      });
      if (!res.ok) {
        return { approved: false, reason: `Webhook error: HTTP ${res.status}` };
      }
      return parseResponse(await res.json());
    } catch (err) {
      return { approved: false, reason: `Webhook error: ${errorMessage(err)}` };
    }
  }
}

function parseResponse(body: unknown): ChannelResponse {
  if (typeof body !== 'object' || body === null) {
    return { approved: false, reason: 'Webhook error: malformed response' };
  }
  const approved = 'approved' in body && body.approved === true;
  const reason = 'reason' in body && typeof body.reason === 'string' ? body.reason : undefined;
  return reason ? { approved, reason } : { approved };
}
