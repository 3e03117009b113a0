/**
 * Audit trail for manual purge actions, one JSON object per line.
 * Credential-like params are dropped before a record is written.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { AuditRecord } from '../protocol/types.js';

const SENSITIVE_PARAM = /token|secret|password|authorization/i;

const AuditRecordSchema = z.object({
  timestamp: z.string(),
  action: z.string(),
  params: z.record(z.unknown()),
  result_summary: z.string(),
  reason: z.string().nullable(),
});

export class AuditLogger {
  private readonly logPath: string;

  constructor(logPath: string) {
    this.logPath = path.resolve(logPath);
    fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
  }

  log(record: AuditRecord): void {
    const params = Object.fromEntries(
      Object.entries(record.params).filter(([key]) => !SENSITIVE_PARAM.test(key)),
    );
    fs.appendFileSync(this.logPath, `${JSON.stringify({ ...record, params })}\n`, 'utf-8');
  }

  /**
   * The last `count` records, oldest first. Lines that do not parse as a
   * record are skipped.
   */
  readRecent(count: number = 50): AuditRecord[] {
    if (!fs.existsSync(this.logPath)) return [];
    const lines = fs.readFileSync(this.logPath, 'utf-8').split('\n').filter(Boolean);
    return lines.slice(-count).flatMap((line) => {
      const parsed = AuditRecordSchema.safeParse(parseLine(line));
      return parsed.success ? [parsed.data] : [];
    });
  }
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}
