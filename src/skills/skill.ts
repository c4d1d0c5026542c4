/**
 * Skill — base class for executors
 *
 * Subclasses implement run(), which returns a success detail or throws.
 * execute() never throws: any error becomes a FAILURE result carrying the
 * error's message.
 */

import { errorMessage } from '../core/errors.js';
import type { IntentKind } from '../core/intent.js';
import type { Executor } from '../core/router.js';
import type { Step, StepResult } from '../core/types.js';

export abstract class Skill implements Executor {
  abstract readonly kind: IntentKind;

  protected abstract run(step: Step): Promise<string>;

  async execute(step: Step): Promise<StepResult> {
    try {
      const detail = await this.run(step);
      return { step, status: 'SUCCESS', detail };
    } catch (err) {
      return { step, status: 'FAILURE', detail: errorMessage(err) };
    }
  }
}

export function stringArg(step: Step, name: string): string {
  const value = step.args[name];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`Missing ${name}`);
  }
  return value.trim();
}

export function optionalStringArg(step: Step, name: string, fallback: string): string {
  const value = step.args[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : fallback;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
