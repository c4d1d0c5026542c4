/**
 * deskpilot run <request...>
 *
 * One turn: plan, check, confirm, execute, record.
 */

import { setQuiet } from '../core/log.js';
import { errorMessage } from '../core/errors.js';
import { requireConfig, startRuntime } from '../cli/runtime.js';
import { formatOutcome, formatStepResult } from '../cli/output.js';

interface RunOptions {
  planFile?: string;
  quiet?: boolean;
}

export async function runCommand(request: string[], options: RunOptions): Promise<void> {
  const rawInput = request.join(' ').trim();
  if (!rawInput) {
    console.error('  No request given. Usage: deskpilot run <request...>');
    process.exit(1);
  }

  setQuiet(options.quiet === true);
  const config = requireConfig();
  const runtime = startRuntime(config, {
    planFile: options.planFile,
    onStepResult: (result) => console.log(formatStepResult(result)),
  });

  try {
    const outcome = await runtime.pipeline.handle(rawInput);
    for (const line of formatOutcome(outcome)) {
      console.log(line);
    }
    if (outcome.status === 'rejected' || outcome.persistenceError) {
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(`  ❌ ${errorMessage(err)}`);
    process.exit(1);
  }
}
