/**
 * Plan Parser — the untrusted boundary
 *
 * Turns whatever the plan generator produced into a frozen Plan.
 * Only structure is checked here: mode, narrative, steps[].intent and
 * primitive argument values. Whether an intent is registered, or its
 * arguments complete, is the safety gate's call, not the parser's.
 *
 * Generator shape:
 *   { "mode": "ACTION", "plan": "Closing Chrome", "steps": [
 *       { "intent": "CLOSE_APP", "args": { "app_name": "Google Chrome" } } ] }
 *
 * Extra fields (e.g. a generator-supplied "safe" flag) are discarded.
 */

import { isMode } from './intent.js';
import { GenerationError, errorMessage } from './errors.js';
import type { ArgValue, CandidateStep, Plan } from './types.js';

export function parsePlan(raw: unknown): Plan {
  if (!isRecord(raw)) {
    throw new GenerationError('Plan must be a JSON object');
  }

  const mode = typeof raw.mode === 'string' ? raw.mode.trim().toUpperCase() : '';
  if (!isMode(mode)) {
    throw new GenerationError(`Invalid mode: ${JSON.stringify(raw.mode)}. Must be CHAT or ACTION`);
  }

  const narrative = raw.plan ?? '';
  if (typeof narrative !== 'string') {
    throw new GenerationError('"plan" must be a string');
  }

  const rawSteps = raw.steps ?? [];
  if (!Array.isArray(rawSteps)) {
    throw new GenerationError('"steps" must be an array');
  }

  const steps = rawSteps.map((s, i) => parseStep(s, i));

  return Object.freeze({
    mode,
    narrative: narrative.trim(),
    steps: Object.freeze(steps),
  });
}

function parseStep(raw: unknown, index: number): CandidateStep {
  const prefix = `Step ${index + 1}`;
  if (!isRecord(raw)) {
    throw new GenerationError(`${prefix}: must be an object`);
  }
  if (typeof raw.intent !== 'string' || raw.intent.trim() === '') {
    throw new GenerationError(`${prefix}: missing "intent"`);
  }

  const args: Record<string, ArgValue> = {};
  if (raw.args !== undefined && raw.args !== null) {
    if (!isRecord(raw.args)) {
      throw new GenerationError(`${prefix}: "args" must be an object`);
    }
    for (const [key, value] of Object.entries(raw.args)) {
      if (value === null || value === undefined) continue;
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        args[key] = value;
      } else {
        throw new GenerationError(`${prefix}: argument "${key}" must be a string, number or boolean`);
      }
    }
  }

  return Object.freeze({
    intent: raw.intent.trim(),
    args: Object.freeze(args),
  });
}

/**
 * Pull a single JSON object out of a model reply: strips code fences,
 * then falls back to the first `{` .. last `}` span.
 */
export function extractJson(content: string): unknown {
  const trimmed = content
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
  if (!trimmed) {
    throw new GenerationError('Plan generator returned an empty reply');
  }

  try {
    return JSON.parse(trimmed);
  } catch {
    // fall through to brace extraction
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start >= 0 && end > start) {
    try {
      return JSON.parse(trimmed.slice(start, end + 1));
    } catch (err) {
      throw new GenerationError(`Unparseable plan JSON: ${errorMessage(err)}`);
    }
  }

  throw new GenerationError('Plan generator reply contains no JSON object');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
