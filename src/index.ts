#!/usr/bin/env node

/**
 * deskpilot — a desktop assistant that asks before it acts
 *
 * Usage:
 *   deskpilot init [--channel=prompt|webhook] [--force]
 *   deskpilot run [--plan-file <file>] [--quiet] <request...>
 *   deskpilot shell [--quiet]
 *   deskpilot audit show [--limit <n>]
 *   deskpilot audit verify
 *   deskpilot status
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { runCommand } from './commands/run.js';
import { shellCommand } from './commands/shell.js';
import { auditShowCommand, auditVerifyCommand } from './commands/audit.js';
import { statusCommand } from './commands/status.js';

const program = new Command();

program
  .name('deskpilot')
  .description('Plan, confirm, then act on your desktop')
  .version('0.1.0');

// deskpilot init
program
  .command('init')
  .description('Write the default configuration')
  .option('--channel <type>', 'Confirmation channel: prompt, webhook', 'prompt')
  .option('--force', 'Overwrite an existing config', false)
  .action(initCommand);

// deskpilot run <request...>
program
  .command('run')
  .description('Handle one request')
  .option('--plan-file <file>', 'Use the plan in this JSON file instead of the planner')
  .option('--quiet', 'Hide diagnostic output', false)
  .argument('<request...>', 'What you want done')
  .action(runCommand);

// deskpilot shell
program
  .command('shell')
  .description('Handle requests line by line')
  .option('--quiet', 'Hide diagnostic output', false)
  .action(shellCommand);

// deskpilot audit
const audit = program
  .command('audit')
  .description('Inspect the audit log');

audit
  .command('show')
  .description('Show recent turns')
  .option('--limit <n>', 'Number of turns to show', '10')
  .action(auditShowCommand);

audit
  .command('verify')
  .description('Check the audit hash chain')
  .action(auditVerifyCommand);

// deskpilot status
program
  .command('status')
  .description('Show configuration and audit status')
  .action(statusCommand);

await program.parseAsync();
