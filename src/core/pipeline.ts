/**
 * Pipeline — one user turn, start to finish
 *
 *   raw text -> generator -> parsePlan -> SafetyGate -> ConfirmationGate
 *            -> Router -> executors -> AuditLog
 *
 * CHAT plans skip the gates and the router. A rejected or declined plan
 * stops before any side effect. A failing step never stops the steps after
 * it. Every turn writes exactly one audit record, including turns that throw.
 * Turns are queued, so records are appended in turn order.
 */

import { v4 as uuidv4 } from 'uuid';
import { parsePlan } from './plan.js';
import { logTag, warnTag } from './log.js';
import { redact } from './redact.js';
import {
  ConfirmationDeclined,
  GenerationError,
  PersistenceFailure,
  ValidationError,
  errorMessage,
} from './errors.js';
import type { SafetyGate } from './safety.js';
import type { ConfirmationGate } from './confirmation.js';
import type { Router } from './router.js';
import type { AuditLog } from './audit.js';
import type { AuditRecord, Plan, Step, StepResult } from './types.js';

export interface PlanGenerator {
  name: string;
  /** Returns the generator's raw output; the pipeline parses and validates it. */
  generate(rawInput: string): Promise<unknown>;
}

export type TurnBody =
  | { status: 'chat'; response: string }
  | { status: 'rejected'; error: GenerationError | ValidationError }
  | { status: 'declined'; error: ConfirmationDeclined }
  | { status: 'executed'; results: StepResult[] };

export type TurnOutcome = TurnBody & {
  record: AuditRecord;
  persistenceError?: PersistenceFailure;
};

export interface PipelineOptions {
  generator: PlanGenerator;
  safety: SafetyGate;
  confirmation: ConfirmationGate;
  router: Router;
  audit: AuditLog;
  /** Redact secret-looking tokens from raw input before it is persisted. */
  redactInput?: boolean;
  /** Called as each step finishes. */
  onStepResult?: (result: StepResult) => void;
}

/**
 * Holds the turn's record while it is being built. flush() writes it at
 * most once, whatever path the turn took.
 */
class TurnBuffer {
  readonly record: AuditRecord;
  private flushed = false;

  constructor(rawInput: string, redactInput: boolean) {
    this.record = {
      id: `turn_${uuidv4().replace(/-/g, '')}`,
      timestamp: new Date().toISOString(),
      raw_input: redactInput ? redact(rawInput) : rawInput,
      plan: null,
      verdict: null,
      confirmed: false,
      results: [],
    };
  }

  flush(audit: AuditLog): PersistenceFailure | undefined {
    if (this.flushed) return undefined;
    this.flushed = true;
    try {
      audit.append(this.record);
      logTag('audit', `${this.record.id} recorded (${this.record.results.length} result(s))`);
      return undefined;
    } catch (err) {
      const failure = new PersistenceFailure(`Audit write failed for ${this.record.id}: ${errorMessage(err)}`);
      warnTag('audit', failure.message);
      return failure;
    }
  }
}

export class Pipeline {
  private turnQueue: Promise<void> = Promise.resolve();

  constructor(private options: PipelineOptions) {}

  handle(rawInput: string): Promise<TurnOutcome> {
    const run = (): Promise<TurnOutcome> => this.runTurn(rawInput);
    const queued = this.turnQueue.then(run, run);
    this.turnQueue = queued.then(() => undefined, () => undefined);
    return queued;
  }

  private async runTurn(rawInput: string): Promise<TurnOutcome> {
    const buffer = new TurnBuffer(rawInput, this.options.redactInput ?? true);

    let body: TurnBody;
    try {
      body = await this.process(rawInput, buffer.record);
    } catch (err) {
      buffer.record.error = `Turn aborted: ${errorMessage(err)}`;
      buffer.flush(this.options.audit);
      throw err;
    }

    const persistenceError = buffer.flush(this.options.audit);
    return { ...body, record: buffer.record, persistenceError };
  }

  private async process(rawInput: string, record: AuditRecord): Promise<TurnBody> {
    const { generator, safety, confirmation } = this.options;

    let plan: Plan;
    try {
      plan = parsePlan(await generator.generate(rawInput));
    } catch (err) {
      const error = err instanceof GenerationError ? err : new GenerationError(errorMessage(err));
      logTag('plan', `${generator.name} -> unusable plan (${error.message})`);
      record.verdict = { status: 'REJECT', reason: error.message, warnings: [], steps: [] };
      record.error = error.message;
      return { status: 'rejected', error };
    }
    record.plan = plan;

    if (plan.mode === 'CHAT') {
      logTag('plan', 'CHAT -> responding without actions');
      return { status: 'chat', response: plan.narrative };
    }

    const verdict = safety.validate(plan);
    record.verdict = verdict;
    logTag('gate', `${plan.steps.length} step(s) -> ${verdict.status}${verdict.reason ? ` (${verdict.reason})` : ''}`);
    for (const warning of verdict.warnings) {
      logTag('gate', `dropped: ${warning}`);
    }
    if (verdict.status === 'REJECT') {
      return { status: 'rejected', error: new ValidationError(verdict.reason ?? 'Plan rejected') };
    }

    // Taken before the channel sees the request.
    const approved = verdict.steps.map((gated) => gated.step);
    const pending = await confirmation.decide(plan, verdict);
    const declined = pending.declined;
    if (declined) {
      record.confirmed = false;
      return { status: 'declined', error: declined };
    }
    record.confirmed = true;

    for (const step of approved) {
      const result = await this.runStep(step);
      record.results.push(result);
      this.options.onStepResult?.(result);
    }

    return { status: 'executed', results: record.results };
  }

  private async runStep(step: Step): Promise<StepResult> {
    const executor = this.options.router.dispatch(step);
    logTag('router', `${step.kind} -> ${executor.constructor.name}`);
    try {
      return await executor.execute(step);
    } catch (err) {
      // Executors should not throw; keep the failure on this step only.
      return { step, status: 'FAILURE', detail: `Executor error: ${errorMessage(err)}` };
    }
  }
}
