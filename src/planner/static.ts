import fs from 'node:fs';
import { GenerationError, errorMessage } from '../core/errors.js';
import type { PlanGenerator } from '../core/pipeline.js';

/**
 * Returns the same plan for every request: a value, or the contents of a
 * JSON file read on each call. Used by `deskpilot run --plan-file`.
 */
export class StaticPlanGenerator implements PlanGenerator {
  name = 'static';

  private constructor(private source: { value: unknown } | { file: string }) {}

  static fromValue(value: unknown): StaticPlanGenerator {
    return new StaticPlanGenerator({ value });
  }

  static fromFile(file: string): StaticPlanGenerator {
    return new StaticPlanGenerator({ file });
  }

  async generate(): Promise<unknown> {
    if ('value' in this.source) {
      return this.source.value;
    }
    try {
      return JSON.parse(fs.readFileSync(this.source.file, 'utf-8'));
    } catch (err) {
      throw new GenerationError(`Could not load plan file ${this.source.file}: ${errorMessage(err)}`);
    }
  }
}
