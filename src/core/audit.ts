/**
 * Audit Log — one hash-chained JSONL line per turn
 *
 * Each turn's AuditRecord is appended once, chained to the previous line
 * by SHA-256 so an edited or removed line breaks verification.
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import type { AuditRecord } from './types.js';

export interface AuditLog {
  append(record: AuditRecord): void;
  read(limit?: number): AuditRecord[];
  count(): number;
}

export interface ChainVerification {
  valid: boolean;
  eventCount: number;
  error?: string;
}

interface AuditEvent extends AuditRecord {
  type: 'turn_record';
  version: string;
  previous_event_hash: string | null;
  event_hash: string;
}

const RECORD_VERSION = '1';

export class JsonlAuditLog implements AuditLog {
  private lastEventHash: string | null = null;
  private eventCount = 0;

  constructor(private logPath: string) {
    this.restoreChainState();
  }

  private readLines(): string[] {
    if (!fs.existsSync(this.logPath)) return [];
    const content = fs.readFileSync(this.logPath, 'utf-8').trim();
    if (!content) return [];
    return content.split('\n').filter(Boolean);
  }

  private restoreChainState(): void {
    for (const line of this.readLines()) {
      const event = parseEvent(line);
      if (!event) continue;
      this.lastEventHash = event.event_hash;
      this.eventCount++;
    }
  }

  append(record: AuditRecord): void {
    const eventWithoutHash = {
      type: 'turn_record' as const,
      version: RECORD_VERSION,
      ...record,
      previous_event_hash: this.lastEventHash,
    };
    const event: AuditEvent = {
      ...eventWithoutHash,
      event_hash: computeHash(eventWithoutHash),
    };

    fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    fs.appendFileSync(this.logPath, JSON.stringify(event) + '\n', 'utf-8');

    this.lastEventHash = event.event_hash;
    this.eventCount++;
  }

  /** Most recent records last; `limit` keeps the newest N. */
  read(limit?: number): AuditRecord[] {
    const records: AuditRecord[] = [];
    for (const line of this.readLines()) {
      const event = parseEvent(line);
      if (event) records.push(stripChain(event));
    }
    if (limit === undefined) return records;
    return records.slice(Math.max(records.length - limit, 0));
  }

  count(): number {
    return this.eventCount;
  }

  verifyChain(): ChainVerification {
    let previousHash: string | null = null;
    let count = 0;

    for (const line of this.readLines()) {
      const event = parseEvent(line);
      if (!event) {
        return { valid: false, eventCount: count, error: `Malformed event at line ${count + 1}` };
      }
      if (event.previous_event_hash !== previousHash) {
        return {
          valid: false,
          eventCount: count,
          error: `Chain broken at event ${count + 1}: expected previous hash ${previousHash}, got ${event.previous_event_hash}`,
        };
      }

      const { event_hash, ...rest } = event;
      if (computeHash(rest) !== event_hash) {
        return { valid: false, eventCount: count, error: `Hash mismatch at event ${count + 1}` };
      }

      previousHash = event_hash;
      count++;
    }

    return { valid: true, eventCount: count };
  }
}

/**
 * Keys are sorted recursively so the hash does not depend on property order.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => canonicalJson(v)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

function computeHash(data: object): string {
  return `sha256:${crypto.createHash('sha256').update(canonicalJson(data), 'utf8').digest('hex')}`;
}

function parseEvent(line: string): AuditEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;
  if (!('type' in parsed) || parsed.type !== 'turn_record') return null;
  if (!('event_hash' in parsed) || typeof parsed.event_hash !== 'string') return null;
  // Shape beyond the chain fields was written by append(); trust it as a record.
  return parsed as AuditEvent;
}

function stripChain(event: AuditEvent): AuditRecord {
  const { type: _type, version: _version, previous_event_hash: _prev, event_hash: _hash, ...record } = event;
  return record;
}
