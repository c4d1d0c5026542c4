/**
 * deskpilot shell — one turn per line until "exit" or EOF
 *
 * The confirmation prompt shares the shell's readline, so answers are read
 * from the same input stream as requests.
 */

import readline from 'node:readline';
import { setQuiet } from '../core/log.js';
import { errorMessage } from '../core/errors.js';
import { requireConfig, startRuntime } from '../cli/runtime.js';
import { formatOutcome, formatStepResult } from '../cli/output.js';
import type { PromptFn } from '../channels/terminal.js';

interface ShellOptions {
  quiet?: boolean;
}

export async function shellCommand(options: ShellOptions): Promise<void> {
  setQuiet(options.quiet === true);
  const config = requireConfig();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  // EOF resolves as an empty answer, which declines a pending confirmation.
  const ask: PromptFn = (question) => new Promise((resolve) => {
    if (closed) {
      resolve('');
      return;
    }
    const onClose = (): void => resolve('');
    rl.once('close', onClose);
    rl.question(question, (answer) => {
      rl.off('close', onClose);
      resolve(answer);
    });
  });

  const runtime = startRuntime(config, {
    prompt: ask,
    onStepResult: (result) => console.log(formatStepResult(result)),
  });

  console.log('');
  console.log('  🖥️  deskpilot shell. Type "exit" to leave.');
  console.log('');

  while (!closed) {
    const line = (await ask('deskpilot> ')).trim();
    if (line === 'exit' || line === 'quit') break;
    if (!line) continue;

    try {
      const outcome = await runtime.pipeline.handle(line);
      for (const out of formatOutcome(outcome)) {
        console.log(out);
      }
    } catch (err) {
      console.error(`  ❌ ${errorMessage(err)}`);
    }
  }

  rl.close();
}
