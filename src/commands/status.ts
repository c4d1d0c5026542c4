/**
 * deskpilot status — config, channel, planner, protected apps, audit
 */

import fs from 'node:fs';
import { configPath, deskpilotHome, loadValidConfig, type DeskpilotConfig } from '../core/config.js';
import { SafetyGate } from '../core/safety.js';
import { createAuditLog } from '../cli/runtime.js';
import { ConfigError, errorMessage } from '../core/errors.js';

export function statusCommand(): void {
  const home = deskpilotHome();
  const file = configPath(home);

  console.log('');
  console.log('  🖥️  deskpilot status');
  console.log('  ────────────────────');

  if (!fs.existsSync(file)) {
    console.log('  Config:    (defaults) Run: deskpilot init');
  } else {
    console.log(`  Config:    ${file}`);
  }

  let config: DeskpilotConfig;
  try {
    config = loadValidConfig(home);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.log(`  Valid:     ❌ ${err.problems.length} problem(s)`);
    for (const problem of err.problems) {
      console.log(`     - ${problem}`);
    }
    console.log('');
    return;
  }

  console.log(`  Channel:   ${config.channel}${config.channel === 'webhook' ? ` (${config.webhook?.url})` : ''}`);
  console.log(`  Planner:   ${config.planner.model} @ ${config.planner.base_url}`);

  const safety = new SafetyGate({
    protectedApps: config.protected_apps,
    hostApps: config.host_apps.length > 0 ? config.host_apps : undefined,
  });
  console.log(`  Protected: ${safety.protectedTargets.size} app(s): ${safety.protectedTargets.list().join(', ')}`);

  console.log(auditStatusLine(config));
  console.log('');
}

/** Counts recorded turns without creating a store that does not exist yet. */
export function auditStatusLine(config: DeskpilotConfig): string {
  const { backend, path } = config.audit;
  if (!fs.existsSync(path)) {
    return `  Audit:     ${backend} ${path} (no turns yet)`;
  }
  try {
    const count = createAuditLog(config).count();
    return `  Audit:     ${backend} ${path} (${count} turn(s))`;
  } catch (err) {
    return `  Audit:     ⚠️  Could not read ${path}: ${errorMessage(err)}`;
  }
}
