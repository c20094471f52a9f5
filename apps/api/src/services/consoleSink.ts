import type { Alert, SafetyStatus, Severity } from '@hearthwatch/shared';
import type { AlertSink } from './alertSink.js';

const RESET = '\x1b[0m';
const BELL = '\x07';
const RULE = '='.repeat(70);

const COLORS: Record<Severity, string> = {
  CRITICAL: '\x1b[91m',
  HIGH: '\x1b[93m',
  MEDIUM: '\x1b[93m',
  LOW: '\x1b[94m',
};

const BEEPS: Record<Severity, number> = {
  CRITICAL: 3,
  HIGH: 2,
  MEDIUM: 2,
  LOW: 1,
};

export interface ConsoleAlertSinkOptions {
  audio?: boolean;
  write?: (text: string) => void;
}

export function formatAlert(alert: Alert): string {
  const color = COLORS[alert.severity];
  const lines = [
    `${color}${RULE}${RESET}`,
    `${color}[${alert.severity}] ${alert.type}${RESET}`,
    `${color}${alert.message}${RESET}`,
    `${color}Time: ${alert.timestamp}${RESET}`,
    `${color}Frame: ${alert.frameNumber}${RESET}`,
  ];

  const details = Object.entries(alert.details);
  if (details.length > 0) {
    lines.push(`${color}Details:${RESET}`);
    for (const [key, value] of details) {
      const shown = typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
      lines.push(`  - ${key}: ${shown}`);
    }
  }

  lines.push(`${color}${RULE}${RESET}`);
  return lines.join('\n');
}

/** Terminal rendering of a batch, with the bell standing in for a buzzer. */
export class ConsoleAlertSink implements AlertSink {
  readonly name = 'console';
  private audio: boolean;
  private write: (text: string) => void;

  constructor(options: ConsoleAlertSinkOptions = {}) {
    this.audio = options.audio ?? true;
    this.write = options.write ?? ((text) => process.stdout.write(text));
  }

  async deliver(alerts: readonly Alert[], _status: SafetyStatus): Promise<void> {
    if (alerts.length === 0) {
      this.write('\n[OK] No hazards detected. Kitchen is safe!\n');
      return;
    }

    this.write(`\n[!] SAFETY ALERT: ${alerts.length} hazard(s) detected!\n`);
    for (const alert of alerts) {
      this.write(`\n${formatAlert(alert)}\n`);
      if (this.audio) {
        this.write(BELL.repeat(BEEPS[alert.severity]));
      }
    }
  }
}
