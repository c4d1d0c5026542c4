import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { Pipeline, type PlanGenerator } from '../core/pipeline.js';
import { SafetyGate } from '../core/safety.js';
import { ConfirmationGate, type ChannelResponse, type ConfirmationChannel, type ConfirmationRequest } from '../core/confirmation.js';
import { createRouter, type Executor, type ExecutorTable } from '../core/router.js';
import { ConfirmationDeclined, GenerationError, ValidationError } from '../core/errors.js';
import { setQuiet } from '../core/log.js';
import type { AuditLog } from '../core/audit.js';
import type { IntentKind } from '../core/intent.js';
import type { AuditRecord, Step, StepResult } from '../core/types.js';

setQuiet(true);

class ScriptedGenerator implements PlanGenerator {
  name = 'scripted';
  public calls: string[] = [];

  constructor(private produce: (rawInput: string) => unknown) {}

  static returning(output: unknown): ScriptedGenerator {
    return new ScriptedGenerator(() => output);
  }

  async generate(rawInput: string): Promise<unknown> {
    this.calls.push(rawInput);
    return this.produce(rawInput);
  }
}

class MockChannel implements ConfirmationChannel {
  name = 'mock';
  public requests: ConfirmationRequest[] = [];
  public response: ChannelResponse = { approved: true };

  async ask(request: ConfirmationRequest): Promise<ChannelResponse> {
    this.requests.push(request);
    return this.response;
  }
}

/** Tries to add a step to the request it is shown, then approves. */
class TamperingChannel implements ConfirmationChannel {
  name = 'tampering';
  public blocked = false;

  async ask(request: ConfirmationRequest): Promise<ChannelResponse> {
    const extra = { step: { kind: 'CLOSE_APP' as const, args: { app_name: 'Finder' } }, requiresConfirmation: true };
    try {
      Reflect.apply(Array.prototype.push, request.steps, [extra]);
    } catch (err) {
      this.blocked = err instanceof TypeError;
    }
    return { approved: true };
  }
}

class RecordingExecutor implements Executor {
  public calls: Step[] = [];
  public fail: string | null = null;
  public throws: Error | null = null;

  constructor(readonly kind: IntentKind) {}

  async execute(step: Step): Promise<StepResult> {
    this.calls.push(step);
    if (this.throws) throw this.throws;
    if (this.fail) return { step, status: 'FAILURE', detail: this.fail };
    return { step, status: 'SUCCESS', detail: `${step.kind} done` };
  }
}

class MemoryAuditLog implements AuditLog {
  public records: AuditRecord[] = [];
  public appendCalls = 0;
  public failWith: Error | null = null;

  append(record: AuditRecord): void {
    this.appendCalls++;
    if (this.failWith) throw this.failWith;
    this.records.push(structuredClone(record));
  }

  read(limit?: number): AuditRecord[] {
    return limit === undefined ? this.records : this.records.slice(-limit);
  }

  count(): number {
    return this.records.length;
  }
}

type Executors = { [K in IntentKind]: RecordingExecutor };

function makeExecutors(): Executors {
  return {
    OPEN_APP: new RecordingExecutor('OPEN_APP'),
    CLOSE_APP: new RecordingExecutor('CLOSE_APP'),
    CLOSE_ALL_APPS: new RecordingExecutor('CLOSE_ALL_APPS'),
    OPEN_URL: new RecordingExecutor('OPEN_URL'),
    SEARCH_WEB: new RecordingExecutor('SEARCH_WEB'),
    CREATE_NOTE: new RecordingExecutor('CREATE_NOTE'),
  };
}

function totalCalls(executors: Executors): number {
  return Object.values(executors).reduce((n, e) => n + e.calls.length, 0);
}

describe('Pipeline', () => {
  let channel: MockChannel;
  let executors: Executors;
  let audit: MemoryAuditLog;
  let routerLookups: number;

  function pipeline(output: unknown, redactInput?: boolean): Pipeline {
    return pipelineFrom(ScriptedGenerator.returning(output), redactInput);
  }

  function pipelineFrom(generator: PlanGenerator, redactInput?: boolean): Pipeline {
    const table: ExecutorTable = executors;
    const router = createRouter(table);
    const dispatch = router.dispatch.bind(router);
    router.dispatch = (step) => {
      routerLookups++;
      return dispatch(step);
    };
    return new Pipeline({
      generator,
      safety: new SafetyGate(),
      confirmation: new ConfirmationGate(channel),
      router,
      audit,
      redactInput,
    });
  }

  beforeEach(() => {
    channel = new MockChannel();
    executors = makeExecutors();
    audit = new MemoryAuditLog();
    routerLookups = 0;
  });

  it('runs a confirmed plan and records the results', async () => {
    const outcome = await pipeline({
      mode: 'ACTION',
      plan: 'Open Safari and look up the weather',
      steps: [
        { intent: 'OPEN_APP', args: { app_name: 'Safari' } },
        { intent: 'SEARCH_WEB', args: { query: 'weather' } },
      ],
    }).handle('open safari and search the weather');

    assert.equal(outcome.status, 'executed');
    assert.equal(channel.requests.length, 1);
    assert.deepEqual(executors.OPEN_APP.calls, [{ kind: 'OPEN_APP', args: { app_name: 'Safari' } }]);
    assert.deepEqual(executors.SEARCH_WEB.calls, [{ kind: 'SEARCH_WEB', args: { query: 'weather' } }]);

    assert.equal(audit.records.length, 1);
    const record = audit.records[0];
    assert.match(record.id, /^turn_[0-9a-f]{32}$/);
    assert.equal(record.raw_input, 'open safari and search the weather');
    assert.equal(record.confirmed, true);
    assert.equal(record.verdict?.status, 'ACCEPT');
    assert.deepEqual(record.results.map((r) => r.status), ['SUCCESS', 'SUCCESS']);
    assert.equal(record.error, undefined);
  });

  it('runs only the steps the safety gate passed, whatever the channel does to the request', async () => {
    const tampering = new TamperingChannel();
    const router = createRouter(executors);
    const outcome = await new Pipeline({
      generator: ScriptedGenerator.returning({
        mode: 'ACTION',
        steps: [{ intent: 'OPEN_APP', args: { app_name: 'Safari' } }],
      }),
      safety: new SafetyGate(),
      confirmation: new ConfirmationGate(tampering),
      router,
      audit,
    }).handle('open safari');

    assert.equal(outcome.status, 'executed');
    assert.equal(tampering.blocked, true);
    assert.deepEqual(executors.OPEN_APP.calls, [{ kind: 'OPEN_APP', args: { app_name: 'Safari' } }]);
    assert.equal(executors.CLOSE_APP.calls.length, 0);
    assert.equal(audit.records[0].verdict?.steps.length, 1);
    assert.equal(audit.records[0].results.length, 1);
  });

  it('keeps going after a failed step', async () => {
    executors.CLOSE_APP.fail = 'Asked Google Chrome to quit, but it is still running (it may be waiting on unsaved changes)';

    const outcome = await pipeline({
      mode: 'ACTION',
      plan: 'Swap browsers',
      steps: [
        { intent: 'CLOSE_APP', args: { app_name: 'Google Chrome' } },
        { intent: 'OPEN_APP', args: { app_name: 'Safari' } },
      ],
    }).handle('close chrome and open safari');

    assert.equal(outcome.status, 'executed');
    assert.equal(executors.OPEN_APP.calls.length, 1);
    assert.deepEqual(audit.records[0].results.map((r) => r.status), ['FAILURE', 'SUCCESS']);
    assert.equal(
      audit.records[0].results[0].detail,
      'Asked Google Chrome to quit, but it is still running (it may be waiting on unsaved changes)',
    );
  });

  it('turns a throwing executor into a failed step', async () => {
    executors.OPEN_URL.throws = new Error('boom');

    const outcome = await pipeline({
      mode: 'ACTION',
      steps: [
        { intent: 'OPEN_URL', args: { url: 'example.com' } },
        { intent: 'CREATE_NOTE', args: { content: 'milk' } },
      ],
    }).handle('do two things');

    assert.equal(outcome.status, 'executed');
    if (outcome.status !== 'executed') return;
    assert.deepEqual(outcome.results.map((r) => [r.status, r.detail]), [
      ['FAILURE', 'Executor error: boom'],
      ['SUCCESS', 'CREATE_NOTE done'],
    ]);
  });

  it('answers CHAT turns without the gates or the router', async () => {
    const outcome = await pipeline({ mode: 'CHAT', plan: 'Hi there!', steps: [] }).handle('hello');

    assert.equal(outcome.status, 'chat');
    if (outcome.status !== 'chat') return;
    assert.equal(outcome.response, 'Hi there!');
    assert.equal(channel.requests.length, 0);
    assert.equal(routerLookups, 0);

    const record = audit.records[0];
    assert.equal(record.plan?.mode, 'CHAT');
    assert.equal(record.verdict, null);
    assert.equal(record.confirmed, false);
    assert.deepEqual(record.results, []);
  });

  it('rejects an unregistered intent before confirmation or routing', async () => {
    const outcome = await pipeline({
      mode: 'ACTION',
      steps: [{ intent: 'FORMAT_DISK', args: { disk: '/' } }],
    }).handle('wipe my disk');

    assert.equal(outcome.status, 'rejected');
    if (outcome.status !== 'rejected') return;
    assert.ok(outcome.error instanceof ValidationError);
    assert.equal(outcome.error.message, 'Unregistered intent "FORMAT_DISK"');
    assert.equal(channel.requests.length, 0);
    assert.equal(routerLookups, 0);
    assert.equal(audit.records[0].verdict?.status, 'REJECT');
    assert.equal(audit.records[0].confirmed, false);
  });

  it('auto-declines when only protected steps were planned', async () => {
    const outcome = await pipeline({
      mode: 'ACTION',
      steps: [{ intent: 'CLOSE_APP', args: { app_name: 'Finder' } }],
    }).handle('close finder');

    assert.equal(outcome.status, 'declined');
    if (outcome.status !== 'declined') return;
    assert.ok(outcome.error instanceof ConfirmationDeclined);
    assert.equal(outcome.error.message, 'Nothing left to run after safety checks');
    assert.equal(channel.requests.length, 0);
    assert.equal(totalCalls(executors), 0);

    const record = audit.records[0];
    assert.equal(record.verdict?.status, 'ACCEPT_WITH_WARNINGS');
    assert.deepEqual(record.verdict?.warnings, ['Step 1 (CLOSE_APP): "Finder" is a protected app']);
    assert.equal(record.confirmed, false);
    assert.deepEqual(record.results, []);
  });

  it('runs nothing when the user declines', async () => {
    channel.response = { approved: false, reason: 'Changed my mind' };

    const outcome = await pipeline({
      mode: 'ACTION',
      steps: [{ intent: 'CLOSE_ALL_APPS', args: {} }],
    }).handle('close everything');

    assert.equal(outcome.status, 'declined');
    assert.equal(totalCalls(executors), 0);
    assert.equal(audit.records[0].confirmed, false);
  });

  it('never executes a protected target alongside allowed steps', async () => {
    await pipeline({
      mode: 'ACTION',
      steps: [
        { intent: 'CLOSE_APP', args: { app_name: 'Dock' } },
        { intent: 'CLOSE_APP', args: { app_name: 'Slack' } },
      ],
    }).handle('close dock and slack');

    assert.deepEqual(executors.CLOSE_APP.calls, [{ kind: 'CLOSE_APP', args: { app_name: 'Slack' } }]);
  });

  it('records generator failures as rejected turns', async () => {
    const outcome = await pipeline('not a plan').handle('gibberish');

    assert.equal(outcome.status, 'rejected');
    if (outcome.status !== 'rejected') return;
    assert.ok(outcome.error instanceof GenerationError);
    assert.equal(outcome.error.message, 'Plan must be a JSON object');

    const record = audit.records[0];
    assert.equal(record.plan, null);
    assert.equal(record.verdict?.status, 'REJECT');
    assert.equal(record.error, 'Plan must be a JSON object');
  });

  it('wraps errors thrown by the generator', async () => {
    const outcome = await pipelineFrom(new ScriptedGenerator(() => {
      throw new Error('connection refused');
    })).handle('open safari');

    assert.equal(outcome.status, 'rejected');
    if (outcome.status !== 'rejected') return;
    assert.ok(outcome.error instanceof GenerationError);
    assert.equal(outcome.error.message, 'connection refused');
    assert.equal(audit.records.length, 1);
  });

  it('writes one record per turn', async () => {
    const p = pipelineFrom(new ScriptedGenerator((raw) => (raw === 'chat'
      ? { mode: 'CHAT', plan: 'ok' }
      : { mode: 'ACTION', steps: [{ intent: 'OPEN_APP', args: { app_name: raw } }] })));

    await p.handle('chat');
    await p.handle('Safari');
    await p.handle('Finder');

    assert.equal(audit.appendCalls, 3);
    assert.deepEqual(audit.records.map((r) => r.raw_input), ['chat', 'Safari', 'Finder']);
  });

  it('reports a failed audit write without retrying', async () => {
    audit.failWith = new Error('disk full');

    const outcome = await pipeline({
      mode: 'ACTION',
      steps: [{ intent: 'OPEN_APP', args: { app_name: 'Safari' } }],
    }).handle('open safari');

    assert.equal(outcome.status, 'executed');
    assert.equal(audit.appendCalls, 1);
    assert.equal(executors.OPEN_APP.calls.length, 1);
    assert.match(outcome.persistenceError?.message ?? '', /^Audit write failed for turn_[0-9a-f]{32}: disk full$/);
  });

  it('records a turn that throws and rethrows the error', async () => {
    const plan = { mode: 'ACTION', steps: [{ intent: 'OPEN_APP', args: { app_name: 'Safari' } }] };
    let crashes = 1;
    const broken = new Pipeline({
      generator: ScriptedGenerator.returning(plan),
      safety: new SafetyGate(),
      confirmation: new ConfirmationGate(channel),
      router: createRouter(executors),
      audit,
      onStepResult: () => {
        if (crashes-- > 0) throw new Error('display crashed');
      },
    });

    await assert.rejects(broken.handle('open safari'), /display crashed/);
    assert.equal(audit.records.length, 1);
    assert.equal(audit.records[0].error, 'Turn aborted: display crashed');
    assert.equal(audit.records[0].confirmed, true);

    const outcome = await broken.handle('open safari again');
    assert.equal(outcome.status, 'executed');
    assert.equal(audit.records.length, 2);
  });

  it('serializes concurrent turns', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const order: string[] = [];

    const slowChannel: ConfirmationChannel = {
      name: 'slow',
      async ask(request) {
        order.push(`ask:${request.narrative}`);
        if (request.narrative === 'first') await gate;
        return { approved: true };
      },
    };
    const p = new Pipeline({
      generator: new ScriptedGenerator((raw) => ({
        mode: 'ACTION',
        plan: raw,
        steps: [{ intent: 'OPEN_APP', args: { app_name: raw } }],
      })),
      safety: new SafetyGate(),
      confirmation: new ConfirmationGate(slowChannel),
      router: createRouter(executors),
      audit,
    });

    const first = p.handle('first');
    const second = p.handle('second');
    await new Promise((resolve) => setImmediate(resolve));
    assert.deepEqual(order, ['ask:first']);

    release();
    await Promise.all([first, second]);
    assert.deepEqual(order, ['ask:first', 'ask:second']);
    assert.deepEqual(audit.records.map((r) => r.raw_input), ['first', 'second']);
  });

  it('redacts secrets from the recorded input', async () => {
    await pipeline({ mode: 'CHAT', plan: 'noted' }).handle('my password: hunter2 please');
    assert.equal(audit.records[0].raw_input, 'my [REDACTED] please');
  });

  it('keeps raw input when redaction is off', async () => {
    await pipeline({ mode: 'CHAT', plan: 'noted' }, false).handle('my password: hunter2 please');
    assert.equal(audit.records[0].raw_input, 'my password: hunter2 please');
  });
});
