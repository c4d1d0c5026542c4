import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { DEFAULT_PROMPT_PATH, OpenAIPlanGenerator } from '../planner/openai.js';
import { StaticPlanGenerator } from '../planner/static.js';
import { GenerationError } from '../core/errors.js';
import { startStubServer, type StubServer } from './http-stub.js';

function completion(content: string): unknown {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1767225600,
    model: 'test-model',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
  };
}

describe('OpenAIPlanGenerator', () => {
  let server: StubServer | null = null;
  let reply = '';

  beforeEach(async () => {
    reply = '';
    server = await startStubServer(() => ({ status: 200, body: completion(reply) }));
  });

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  function generator(context?: () => Promise<string | undefined>): OpenAIPlanGenerator {
    return new OpenAIPlanGenerator({
      baseURL: `${server?.url}/v1`,
      model: 'test-model',
      apiKey: 'test-secret',
      maxTokens: 256,
      now: () => new Date('2026-03-04T10:00:00Z'),
      context,
    });
  }

  it('sends the system prompt, date and request', async () => {
    reply = '{"mode":"CHAT","plan":"Hello","steps":[]}';
    const output = await generator().generate('say hello');

    assert.deepEqual(output, { mode: 'CHAT', plan: 'Hello', steps: [] });
    const received = server?.requests[0];
    assert.equal(received?.url, '/v1/chat/completions');
    assert.equal(received?.headers.authorization, 'Bearer test-secret');

    const body = JSON.parse(received?.body ?? '{}');
    assert.equal(body.model, 'test-model');
    assert.equal(body.max_tokens, 256);
    assert.equal(body.temperature, 0);
    assert.equal(body.messages[0].role, 'system');
    assert.equal(body.messages[0].content, fs.readFileSync(DEFAULT_PROMPT_PATH, 'utf-8'));
    assert.deepEqual(body.messages[1], { role: 'user', content: 'CURRENT DATE: 2026-03-04\n\nsay hello' });
  });

  it('appends the system context to the user message', async () => {
    reply = '{"mode":"CHAT","plan":"Hello","steps":[]}';
    await generator(async () => 'Running Apps: Finder, Safari').generate('close safari');

    const body = JSON.parse(server?.requests[0]?.body ?? '{}');
    assert.deepEqual(body.messages[1], {
      role: 'user',
      content: 'CURRENT DATE: 2026-03-04\n\nclose safari\n\n[System Context]\nRunning Apps: Finder, Safari',
    });
  });

  it('plans without context when the provider fails', async () => {
    reply = '{"mode":"CHAT","plan":"Hello","steps":[]}';
    const output = await generator(async () => {
      throw new Error('osascript timed out');
    }).generate('close safari');

    assert.deepEqual(output, { mode: 'CHAT', plan: 'Hello', steps: [] });
    const body = JSON.parse(server?.requests[0]?.body ?? '{}');
    assert.equal(body.messages[1].content, 'CURRENT DATE: 2026-03-04\n\nclose safari');
  });

  it('extracts JSON from a fenced reply', async () => {
    reply = '```json\n{"mode":"ACTION","plan":"Open Safari","steps":[{"intent":"OPEN_APP","args":{"app_name":"Safari"}}]}\n```';
    assert.deepEqual(await generator().generate('open safari'), {
      mode: 'ACTION',
      plan: 'Open Safari',
      steps: [{ intent: 'OPEN_APP', args: { app_name: 'Safari' } }],
    });
  });

  it('throws GenerationError for a reply without JSON', async () => {
    reply = 'I am not sure what you mean.';
    await assert.rejects(generator().generate('???'), (err: unknown) => {
      assert.ok(err instanceof GenerationError);
      assert.equal(err.message, 'Plan generator reply contains no JSON object');
      return true;
    });
  });

  it('throws GenerationError when the endpoint fails', async () => {
    await server?.close();
    server = await startStubServer(() => ({ status: 500, body: { error: { message: 'model crashed' } } }));

    await assert.rejects(generator().generate('open safari'), (err: unknown) => {
      assert.ok(err instanceof GenerationError);
      assert.match(err.message, /^Planner request failed: /);
      return true;
    });
  });

  it('throws GenerationError when the prompt file is missing', async () => {
    const missing = new OpenAIPlanGenerator({
      baseURL: `${server?.url}/v1`,
      model: 'test-model',
      promptPath: path.join(os.tmpdir(), 'deskpilot-no-such-prompt.md'),
    });
    await assert.rejects(missing.generate('open safari'), /^GenerationError: Could not read planner prompt/);
    assert.equal(server?.requests.length, 0);
  });
});

describe('StaticPlanGenerator', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'deskpilot-plan-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns a fixed value', async () => {
    const plan = { mode: 'CHAT', plan: 'hi' };
    assert.deepEqual(await StaticPlanGenerator.fromValue(plan).generate(), plan);
  });

  it('reads a plan file', async () => {
    const file = path.join(tmpDir, 'plan.json');
    fs.writeFileSync(file, JSON.stringify({ mode: 'ACTION', steps: [{ intent: 'CLOSE_ALL_APPS' }] }));
    assert.deepEqual(await StaticPlanGenerator.fromFile(file).generate(), {
      mode: 'ACTION',
      steps: [{ intent: 'CLOSE_ALL_APPS' }],
    });
  });

  it('throws GenerationError for a bad file', async () => {
    const file = path.join(tmpDir, 'plan.json');
    fs.writeFileSync(file, '{ nope');
    await assert.rejects(StaticPlanGenerator.fromFile(file).generate(), GenerationError);
  });
});
