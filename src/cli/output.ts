import type { TurnOutcome } from '../core/pipeline.js';
import type { StepResult } from '../core/types.js';

export function formatStepResult(result: StepResult): string {
  const icon = result.status === 'SUCCESS' ? '✅' : '❌';
  return `  ${icon} ${result.step.kind}: ${result.detail}`;
}

/**
 * Lines shown to the user once a turn is over. Step results are printed
 * as they happen, so an executed turn only gets a summary line here.
 */
export function formatOutcome(outcome: TurnOutcome): string[] {
  const lines: string[] = [];
  switch (outcome.status) {
    case 'chat':
      lines.push(`  💬 ${outcome.response}`);
      break;
    case 'rejected':
      lines.push(`  ❌ Plan rejected: ${outcome.error.message}`);
      break;
    case 'declined':
      lines.push(`  🚫 Not run: ${outcome.error.message}`);
      break;
    case 'executed': {
      const failed = outcome.results.filter((r) => r.status === 'FAILURE').length;
      const total = outcome.results.length;
      lines.push(failed === 0
        ? `  Done: ${total} step(s) succeeded`
        : `  Done: ${total - failed} of ${total} step(s) succeeded, ${failed} failed`);
      break;
    }
  }
  if (outcome.persistenceError) {
    lines.push(`  ⚠️  Turn was not recorded: ${outcome.persistenceError.message}`);
  }
  return lines;
}
