/**
 * Router — IntentKind to exactly one executor
 *
 * Built once at startup from a complete registration table. A missing,
 * duplicate, mislabelled or unrecognized entry throws
 * RouterConfigurationError; there is no catch-all executor.
 */

import { INTENT_KINDS, isIntentKind, type IntentKind } from './intent.js';
import { RouterConfigurationError } from './errors.js';
import type { Step, StepResult } from './types.js';

export interface Executor {
  readonly kind: IntentKind;
  /** Must not throw: failures come back as a FAILURE StepResult. */
  execute(step: Step): Promise<StepResult>;
}

export type ExecutorTable = Readonly<Record<IntentKind, Executor>>;

export class Router {
  private routes: ReadonlyMap<IntentKind, Executor>;

  /** Registrations may come from loosely typed sources; all are checked. */
  constructor(entries: Iterable<readonly [string, Executor]>) {
    this.routes = buildRoutes(entries);
  }

  dispatch(step: Step): Executor {
    const executor = this.routes.get(step.kind);
    if (!executor) {
      // buildRoutes guarantees every kind is present
      throw new RouterConfigurationError([`No executor for ${step.kind}`]);
    }
    return executor;
  }

  kinds(): IntentKind[] {
    return [...this.routes.keys()];
  }
}

export function createRouter(table: ExecutorTable): Router {
  return new Router(Object.entries(table));
}

function buildRoutes(entries: Iterable<readonly [string, Executor]>): Map<IntentKind, Executor> {
  const routes = new Map<IntentKind, Executor>();
  const problems: string[] = [];

  for (const [key, executor] of entries) {
    if (!isIntentKind(key)) {
      problems.push(`executor registered under unrecognized kind "${key}"`);
      continue;
    }
    if (routes.has(key)) {
      problems.push(`kind ${key} registered more than once`);
      continue;
    }
    if (executor.kind !== key) {
      problems.push(`executor for ${executor.kind} registered under ${key}`);
      continue;
    }
    routes.set(key, executor);
  }

  for (const kind of INTENT_KINDS) {
    if (!routes.has(kind)) {
      problems.push(`no executor registered for ${kind}`);
    }
  }

  if (problems.length > 0) {
    throw new RouterConfigurationError(problems);
  }
  return routes;
}
