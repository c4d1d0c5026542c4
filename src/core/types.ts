/**
 * Core Types — Plan, Step, Verdict, StepResult, AuditRecord
 *
 * A Plan is what the generator proposed (kinds still untrusted).
 * A Step is what the safety gate let through (kind narrowed to IntentKind).
 * A StepResult is what an executor reported.
 * An AuditRecord is the single persisted account of one turn.
 */

import type { IntentKind, Mode } from './intent.js';

export type ArgValue = string | number | boolean;
export type StepArgs = Readonly<Record<string, ArgValue>>;

export interface CandidateStep {
  readonly intent: string;
  readonly args: StepArgs;
}

export interface Plan {
  readonly mode: Mode;
  readonly narrative: string;
  readonly steps: readonly CandidateStep[];
}

export interface Step {
  readonly kind: IntentKind;
  readonly args: StepArgs;
}

export interface GatedStep {
  step: Step;
  requiresConfirmation: boolean;
}

export type VerdictStatus = 'ACCEPT' | 'ACCEPT_WITH_WARNINGS' | 'REJECT';

export interface ValidationVerdict {
  status: VerdictStatus;
  reason?: string;
  warnings: string[];
  steps: GatedStep[];
}

export type StepStatus = 'SUCCESS' | 'FAILURE';

export interface StepResult {
  step: Step;
  status: StepStatus;
  detail: string;
}

export interface AuditRecord {
  id: string;
  timestamp: string;
  raw_input: string;
  plan: Plan | null;
  verdict: ValidationVerdict | null;
  confirmed: boolean;
  results: StepResult[];
  error?: string;
}
