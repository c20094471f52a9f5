import path from 'node:path';
import fs from 'node:fs/promises';
import { toAlertJson } from '@hearthwatch/shared';
import type { Alert, AlertJson, AlertSummary, SafetyStatus } from '@hearthwatch/shared';
import type { AlertSink } from './alertSink.js';

/** Local calendar day as YYYYMMDD. */
export function dayStamp(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}${m}${d}`;
}

function isAlertJson(value: unknown): value is AlertJson {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'type') === 'string' &&
    typeof Reflect.get(value, 'severity') === 'string'
  );
}

/**
 * One JSON array of alerts per day in `alerts_YYYYMMDD.json`. Appends are
 * chained so concurrent batches never interleave their read-modify-write.
 */
export class DailyAlertLog implements AlertSink {
  readonly name = 'daily-log';
  private logDir: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(logDir: string) {
    this.logDir = logDir;
  }

  getLogDir(): string {
    return this.logDir;
  }

  fileFor(date: Date): string {
    return path.join(this.logDir, `alerts_${dayStamp(date)}.json`);
  }

  async deliver(alerts: readonly Alert[], _status: SafetyStatus): Promise<void> {
    const [first] = alerts;
    if (!first) return;
    // File by the evaluation stamp, not the write time
    await this.append(alerts, new Date(first.timestamp));
  }

  append(alerts: readonly Alert[], now: Date = new Date()): Promise<void> {
    const run = this.pending.then(() => this.appendNow(alerts, now));
    // Keep the chain alive after a failed write; the caller still sees the error.
    this.pending = run.catch(() => undefined);
    return run;
  }

  async read(date: Date = new Date()): Promise<AlertJson[]> {
    const file = this.fileFor(date);
    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return Array.isArray(parsed) ? parsed.filter(isAlertJson) : [];
    } catch {
      console.warn(`[alert-log] ${file} is not valid JSON, starting a new array`);
      return [];
    }
  }

  async getSummary(date: Date = new Date()): Promise<AlertSummary> {
    const logs = await this.read(date);
    const summary: AlertSummary = { date: dayStamp(date), total: logs.length, byType: {}, bySeverity: {} };
    for (const alert of logs) {
      summary.byType[alert.type] = (summary.byType[alert.type] ?? 0) + 1;
      summary.bySeverity[alert.severity] = (summary.bySeverity[alert.severity] ?? 0) + 1;
    }
    return summary;
  }

  private async appendNow(alerts: readonly Alert[], now: Date): Promise<void> {
    await fs.mkdir(this.logDir, { recursive: true });
    const logs = await this.read(now);
    logs.push(...alerts.map(toAlertJson));
    await fs.writeFile(this.fileFor(now), JSON.stringify(logs, null, 2));
  }
}

export function formatSummary(summary: AlertSummary): string {
  const lines = ['='.repeat(60), `[SUMMARY] ALERTS FOR ${summary.date}`, '='.repeat(60)];
  lines.push(`Total alerts: ${summary.total}`);
  if (summary.total === 0) {
    lines.push('[OK] No alerts today - kitchen has been safe!');
  } else {
    lines.push('', 'By type:');
    for (const [type, count] of Object.entries(summary.byType)) lines.push(`  - ${type}: ${count}`);
    lines.push('', 'By severity:');
    for (const [severity, count] of Object.entries(summary.bySeverity)) lines.push(`  - ${severity}: ${count}`);
  }
  lines.push('='.repeat(60));
  return lines.join('\n');
}
