/**
 * deskpilot audit show | verify
 */

import { JsonlAuditLog } from '../core/audit.js';
import { createAuditLog, requireConfig } from '../cli/runtime.js';
import type { AuditRecord } from '../core/types.js';

interface ShowOptions {
  limit: string;
}

export function auditShowCommand(options: ShowOptions): void {
  const limit = parseInt(options.limit, 10);
  if (!Number.isInteger(limit) || limit <= 0) {
    console.error(`  ❌ --limit must be a positive integer, got "${options.limit}"`);
    process.exit(1);
  }

  const config = requireConfig();
  const records = createAuditLog(config).read(limit);

  console.log('');
  if (records.length === 0) {
    console.log('  No turns recorded yet.');
    console.log('');
    return;
  }
  for (const record of records) {
    for (const line of formatRecord(record)) {
      console.log(line);
    }
    console.log('');
  }
}

export function auditVerifyCommand(): void {
  const config = requireConfig();
  const log = createAuditLog(config);

  if (!(log instanceof JsonlAuditLog)) {
    console.log(`  The ${config.audit.backend} audit store is not hash-chained; nothing to verify.`);
    return;
  }

  const result = log.verifyChain();
  if (result.valid) {
    console.log(`  ✅ Audit chain intact (${result.eventCount} turn(s))`);
  } else {
    console.error(`  ❌ Audit chain invalid after ${result.eventCount} turn(s): ${result.error}`);
    process.exit(1);
  }
}

export function formatRecord(record: AuditRecord): string[] {
  const lines = [`  ${record.timestamp}  ${record.id}`, `    Input:     ${record.raw_input}`];

  if (record.plan) {
    lines.push(`    Mode:      ${record.plan.mode}`);
  }
  if (record.verdict) {
    const reason = record.verdict.reason ? ` (${record.verdict.reason})` : '';
    lines.push(`    Verdict:   ${record.verdict.status}${reason}`);
  }
  lines.push(`    Confirmed: ${record.confirmed ? 'yes' : 'no'}`);
  for (const result of record.results) {
    const icon = result.status === 'SUCCESS' ? '✅' : '❌';
    lines.push(`    ${icon} ${result.step.kind}: ${result.detail}`);
  }
  if (record.error) {
    lines.push(`    Error:     ${record.error}`);
  }
  return lines;
}
