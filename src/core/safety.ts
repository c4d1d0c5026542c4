/**
 * Safety Gate — static validation before anything executes
 *
 * One method: validate(plan) => ValidationVerdict
 *
 * For each step, in plan order:
 *   1. Registration: unknown intent rejects the whole plan
 *   2. Arguments: missing or wrong-typed args drop the step (warning)
 *   3. Protected targets: steps aimed at a protected app are dropped (warning)
 *   4. Destructive kinds are tagged requiresConfirmation
 *
 * Steps are dropped, never edited. Validation holds no state between calls.
 */

import { INTENT_SPECS, isIntentKind, type ArgType, type IntentKind, type IntentSpec } from './intent.js';
import type { CandidateStep, GatedStep, Plan, Step, ValidationVerdict } from './types.js';

/** OS components that are never a valid target. */
export const DEFAULT_PROTECTED_APPS: readonly string[] = [
  'System',
  'System Settings',
  'SystemUIServer',
  'WindowServer',
  'ControlCenter',
  'NotificationCenter',
  'Finder',
  'Dock',
  'loginwindow',
];

/** Processes that may be hosting deskpilot itself. */
export const DEFAULT_HOST_APPS: readonly string[] = ['deskpilot', 'Terminal', 'iTerm2'];

export interface SafetyGateOptions {
  protectedApps?: readonly string[];
  hostApps?: readonly string[];
}

export function normalizeAppName(name: string): string {
  return name.trim().replace(/\.app$/i, '').trim().toLowerCase();
}

export class ProtectedTargets {
  private names: ReadonlySet<string>;

  constructor(names: Iterable<string>) {
    const normalized = new Set<string>();
    for (const name of names) {
      const n = normalizeAppName(name);
      if (n) normalized.add(n);
    }
    this.names = normalized;
  }

  has(appName: string): boolean {
    return this.names.has(normalizeAppName(appName));
  }

  get size(): number {
    return this.names.size;
  }

  list(): string[] {
    return [...this.names].sort();
  }
}

type StepCheck =
  | { ok: true; step: Step; requiresConfirmation: boolean }
  | { ok: false; reason: 'arguments' | 'protected'; warning: string };

export class SafetyGate {
  readonly protectedTargets: ProtectedTargets;

  constructor(options: SafetyGateOptions = {}) {
    this.protectedTargets = new ProtectedTargets([
      ...DEFAULT_PROTECTED_APPS,
      ...(options.hostApps ?? DEFAULT_HOST_APPS),
      ...(options.protectedApps ?? []),
    ]);
  }

  validate(plan: Plan): ValidationVerdict {
    // Registration is checked over the whole plan first: one unknown
    // intent fails the plan regardless of where it sits.
    const registered: Array<{ kind: IntentKind; candidate: CandidateStep }> = [];
    for (const candidate of plan.steps) {
      if (!isIntentKind(candidate.intent)) {
        return reject(`Unregistered intent "${candidate.intent}"`, []);
      }
      registered.push({ kind: candidate.intent, candidate });
    }

    const warnings: string[] = [];
    const steps: GatedStep[] = [];
    let argumentDrops = 0;

    registered.forEach(({ kind, candidate }, i) => {
      const result = this.checkStep(kind, candidate, i);
      if (result.ok) {
        steps.push({ step: result.step, requiresConfirmation: result.requiresConfirmation });
        return;
      }
      warnings.push(result.warning);
      if (result.reason === 'arguments') argumentDrops++;
    });

    if (steps.length === 0 && argumentDrops > 0) {
      return reject('No valid steps remain after argument checks', warnings);
    }

    return {
      status: warnings.length > 0 ? 'ACCEPT_WITH_WARNINGS' : 'ACCEPT',
      warnings,
      steps,
    };
  }

  private checkStep(kind: IntentKind, candidate: CandidateStep, index: number): StepCheck {
    const prefix = `Step ${index + 1} (${kind})`;
    const spec = INTENT_SPECS[kind];

    const argProblem = checkArguments(spec, candidate);
    if (argProblem) {
      return { ok: false, reason: 'arguments', warning: `${prefix}: ${argProblem}` };
    }

    if (spec.target) {
      const target = candidate.args[spec.target];
      if (typeof target === 'string' && this.protectedTargets.has(target)) {
        return { ok: false, reason: 'protected', warning: `${prefix}: "${target}" is a protected app` };
      }
    }

    return {
      ok: true,
      step: { kind, args: candidate.args },
      requiresConfirmation: spec.destructive,
    };
  }
}

function checkArguments(spec: IntentSpec, candidate: CandidateStep): string | null {
  for (const [name, type] of Object.entries(spec.required)) {
    const value = candidate.args[name];
    if (value === undefined) {
      return `missing argument "${name}"`;
    }
    if (!matchesType(value, type)) {
      return `argument "${name}" must be a ${type}`;
    }
    if (type === 'string' && String(value).trim() === '') {
      return `argument "${name}" is empty`;
    }
  }

  for (const [name, type] of Object.entries(spec.optional ?? {})) {
    const value = candidate.args[name];
    if (value !== undefined && !matchesType(value, type)) {
      return `argument "${name}" must be a ${type}`;
    }
  }

  return null;
}

function matchesType(value: unknown, type: ArgType): boolean {
  return typeof value === type;
}

function reject(reason: string, warnings: string[]): ValidationVerdict {
  return { status: 'REJECT', reason, warnings, steps: [] };
}
