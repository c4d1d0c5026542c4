/**
 * Terminal Channel
 *
 * Prints the plan in the terminal and waits for y/N. Anything other than
 * "y" or "yes" declines, including an empty answer.
 */

import readline from 'node:readline';
import type { ChannelResponse, ConfirmationChannel, ConfirmationRequest } from '../core/confirmation.js';
import type { ArgValue } from '../core/types.js';

export type PromptFn = (question: string) => Promise<string>;

export class TerminalChannel implements ConfirmationChannel {
  name = 'terminal';

  constructor(
    private prompt: PromptFn = promptOnce,
    private print: (line: string) => void = (line) => console.log(line),
  ) {}

  async ask(request: ConfirmationRequest): Promise<ChannelResponse> {
    for (const line of formatRequest(request)) {
      this.print(line);
    }

    const answer = await this.prompt('  Run these steps? [y/N] ');
    const choice = answer.toLowerCase().trim();

    if (choice === 'y' || choice === 'yes') {
      this.print('  ✅ Confirmed');
      return { approved: true };
    }

    this.print('  ❌ Cancelled');
    return {
      approved: false,
      reason: choice === '' ? 'No response (default decline)' : `User declined: ${answer.trim()}`,
    };
  }
}

export function formatRequest(request: ConfirmationRequest): string[] {
  const rule = '  ════════════════════════════════════════════════════';
  const thin = '  ────────────────────────────────────────────────────';
  const lines = ['', rule, `    🔐 CONFIRM PLAN (${request.id})`, rule];

  if (request.narrative) {
    lines.push(`    Plan: ${request.narrative}`);
    lines.push(thin);
  }

  request.steps.forEach(({ step, requiresConfirmation }, i) => {
    const args = formatArgs(step.args);
    const flag = requiresConfirmation ? '  ⚠️  destructive' : '';
    lines.push(`    ${i + 1}. ${step.kind}${args ? ` ${args}` : ''}${flag}`);
  });

  if (request.warnings.length > 0) {
    lines.push(thin);
    lines.push('    Dropped by safety checks:');
    for (const warning of request.warnings) {
      lines.push(`      - ${warning}`);
    }
  }

  lines.push(rule, '');
  return lines;
}

function formatArgs(args: Readonly<Record<string, ArgValue>>): string {
  return Object.entries(args)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(' ');
}

function promptOnce(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}
