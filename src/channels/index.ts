import { TerminalChannel, type PromptFn } from './terminal.js';
import { WebhookChannel } from './webhook.js';
import type { ConfirmationChannel } from '../core/confirmation.js';
import type { DeskpilotConfig } from '../core/config.js';

export function createChannel(config: DeskpilotConfig, prompt?: PromptFn): ConfirmationChannel {
  switch (config.channel) {
    case 'webhook':
      return new WebhookChannel(config.webhook?.url ?? '', config.webhook?.secret);
    case 'prompt':
    default:
      return new TerminalChannel(prompt);
  }
}
