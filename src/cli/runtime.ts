/**
 * Wires a Pipeline from configuration.
 *
 * Every command that runs turns goes through here, so the router table is
 * checked once per process and a bad table stops the CLI before any turn.
 */

import { JsonlAuditLog, type AuditLog } from '../core/audit.js';
import { configPath, deskpilotHome, loadValidConfig, type DeskpilotConfig } from '../core/config.js';
import { ConfigError, RouterConfigurationError, errorMessage } from '../core/errors.js';
import { ConfirmationGate } from '../core/confirmation.js';
import { Pipeline, type PlanGenerator } from '../core/pipeline.js';
import { createRouter } from '../core/router.js';
import { SafetyGate } from '../core/safety.js';
import { SqliteAuditLog } from '../audit/sqlite-store.js';
import { createChannel } from '../channels/index.js';
import { OpenAIPlanGenerator } from '../planner/openai.js';
import { StaticPlanGenerator } from '../planner/static.js';
import { createDesktop, type DesktopAutomation } from '../skills/desktop.js';
import { createSkills } from '../skills/index.js';
import type { PromptFn } from '../channels/terminal.js';
import type { StepResult } from '../core/types.js';

export interface RuntimeOptions {
  planFile?: string;
  prompt?: PromptFn;
  desktop?: DesktopAutomation;
  onStepResult?: (result: StepResult) => void;
}

export interface Runtime {
  pipeline: Pipeline;
  audit: AuditLog;
  safety: SafetyGate;
  generator: PlanGenerator;
}

export function createAuditLog(config: DeskpilotConfig): AuditLog {
  return config.audit.backend === 'sqlite'
    ? new SqliteAuditLog(config.audit.path)
    : new JsonlAuditLog(config.audit.path);
}

/** Planner context line listing the running apps. */
export async function runningAppsContext(desktop: DesktopAutomation): Promise<string> {
  const apps = await desktop.runningApps();
  return `Running Apps: ${apps.join(', ')}`;
}

export function createGenerator(
  config: DeskpilotConfig,
  planFile?: string,
  env: Record<string, string | undefined> = process.env,
  context?: () => Promise<string | undefined>,
): PlanGenerator {
  if (planFile) {
    return StaticPlanGenerator.fromFile(planFile);
  }
  const { planner } = config;
  return new OpenAIPlanGenerator({
    baseURL: planner.base_url,
    model: planner.model,
    apiKey: env[planner.api_key_env],
    maxTokens: planner.max_tokens,
    temperature: planner.temperature,
    context,
  });
}

/** Throws RouterConfigurationError if the executor table is incomplete. */
export function buildRuntime(config: DeskpilotConfig, options: RuntimeOptions = {}): Runtime {
  const safety = new SafetyGate({
    protectedApps: config.protected_apps,
    hostApps: config.host_apps.length > 0 ? config.host_apps : undefined,
  });
  const desktop = options.desktop ?? createDesktop();
  const router = createRouter(createSkills(desktop, safety.protectedTargets));
  const audit = createAuditLog(config);
  const generator = createGenerator(config, options.planFile, process.env, () => runningAppsContext(desktop));

  const pipeline = new Pipeline({
    generator,
    safety,
    confirmation: new ConfirmationGate(createChannel(config, options.prompt)),
    router,
    audit,
    redactInput: config.audit.redact,
    onStepResult: options.onStepResult,
  });

  return { pipeline, audit, safety, generator };
}

/**
 * Loads and validates the config, or prints every problem and exits.
 */
export function requireConfig(home: string = deskpilotHome()): DeskpilotConfig {
  try {
    return loadValidConfig(home);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`  ❌ Invalid configuration (${configPath(home)}):`);
    for (const problem of err.problems) {
      console.error(`     - ${problem}`);
    }
    process.exit(1);
  }
}

/**
 * buildRuntime for commands: any construction error (a broken router table,
 * an audit store that cannot be opened) is printed and fatal.
 */
export function startRuntime(config: DeskpilotConfig, options: RuntimeOptions = {}): Runtime {
  try {
    return buildRuntime(config, options);
  } catch (err) {
    if (err instanceof RouterConfigurationError) {
      console.error('  ❌ Fatal: executor table is incomplete');
      for (const problem of err.problems) {
        console.error(`     - ${problem}`);
      }
    } else {
      console.error(`  ❌ Could not start: ${errorMessage(err)}`);
    }
    process.exit(1);
  }
}
