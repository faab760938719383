import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { InspectionReport } from '../detection/types.js';
import { log } from './log.js';

/**
 * Structured JSONL audit log of flagged samples.
 *
 * Writes one JSON line per corrupted sample to:
 *   ~/.output-sentinel/logs/output-sentinel-audit-YYYY-MM-DD.jsonl
 */
export class AuditLogger {
  private logDir: string;
  private enabled: boolean;

  constructor(options?: { logDir?: string; enabled?: boolean }) {
    this.logDir = options?.logDir ?? path.join(os.homedir(), '.output-sentinel', 'logs');
    this.enabled = options?.enabled ?? false;
  }

  /**
   * Record a flagged report. Acceptable reports are skipped. Write failures
   * are reported on stderr and never reach the caller.
   */
  async logInspection(report: InspectionReport, source: string): Promise<void> {
    if (!this.enabled || !report.corrupted) return;

    const entry: AuditEntry = {
      timestamp: new Date().toISOString(),
      source,
      length: report.length,
      compositionRatio: report.compositionRatio,
      detections: report.detections.map(d => ({
        ruleId: d.ruleId,
        ruleName: d.ruleName,
        tier: d.tier,
        matchOffset: d.matchOffset,
      })),
    };

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
      await fs.promises.appendFile(this.getLogFilePath(), JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error: unknown) {
      log('warn', `Audit write failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  getLogFilePath(): string {
    const date = new Date().toISOString().slice(0, 10); // YYYY-MM-DD
    return path.join(this.logDir, `output-sentinel-audit-${date}.jsonl`);
  }
}

/** Shape of a single audit log entry. */
export interface AuditEntry {
  timestamp: string;
  source: string;
  length: number;
  compositionRatio: number;
  detections: Array<{
    ruleId: string;
    ruleName: string;
    tier: string;
    matchOffset: number;
  }>;
}
