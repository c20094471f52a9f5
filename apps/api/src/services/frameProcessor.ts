import { overallStatus, parseFrame, SAFE_STATUS } from '@hearthwatch/engine';
import type { InvalidFrameError, SafetyChecker } from '@hearthwatch/engine';
import type { Alert, SafetyStatus } from '@hearthwatch/shared';
import type { AlertSink } from './alertSink.js';

const HISTORY_LIMIT = 500;

export type FrameResult =
  | { ok: true; frameNumber: number | 'unknown'; alerts: Alert[]; status: SafetyStatus }
  | { ok: false; error: InvalidFrameError };

export class FrameProcessor {
  private checker: SafetyChecker;
  private sinks: AlertSink[];
  private history: Alert[] = [];
  private lastStatus: SafetyStatus = SAFE_STATUS;
  private framesProcessed = 0;

  constructor(checker: SafetyChecker, sinks: AlertSink[] = []) {
    this.checker = checker;
    this.sinks = sinks;
  }

  addSink(sink: AlertSink): void {
    this.sinks.push(sink);
  }

  /**
   * Validates one detection/classification pair, evaluates it and hands the
   * emitted alerts to every sink. Invalid input never reaches the rules.
   */
  async process(rawDetections: unknown, rawClassifications: unknown, now: Date = new Date()): Promise<FrameResult> {
    const parsed = parseFrame(rawDetections, rawClassifications);
    if (!parsed.ok) {
      console.warn(`[frames] rejected frame: ${parsed.error.issues.join('; ')}`);
      return { ok: false, error: parsed.error };
    }

    const { frame, classifications } = parsed.value;
    const alerts = this.checker.evaluate(frame, classifications, { now });
    const status = overallStatus(alerts);

    this.framesProcessed++;
    this.lastStatus = status;
    this.remember(alerts);

    if (alerts.length > 0) {
      console.log(
        `[frames] frame ${frame.frameNumber}: ${alerts.length} alert(s) emitted (${alerts.map((a) => a.type).join(', ')})`,
      );
    }

    await this.dispatch(alerts, status);
    return { ok: true, frameNumber: frame.frameNumber, alerts, status };
  }

  private remember(alerts: Alert[]): void {
    this.history.push(...alerts);
    if (this.history.length > HISTORY_LIMIT) {
      this.history.splice(0, this.history.length - HISTORY_LIMIT);
    }
  }

  private async dispatch(alerts: Alert[], status: SafetyStatus): Promise<void> {
    for (const sink of this.sinks) {
      try {
        await sink.deliver(alerts, status);
      } catch (err) {
        // One broken sink must not keep alerts from the others
        console.error(`[frames] sink ${sink.name} failed:`, err);
      }
    }
  }

  getLastStatus(): SafetyStatus {
    return this.lastStatus;
  }

  /** Most recent emitted alerts, oldest first. */
  getRecentAlerts(limit = 50): Alert[] {
    const count = Math.max(0, Math.min(limit, HISTORY_LIMIT));
    return count === 0 ? [] : this.history.slice(-count);
  }

  getFramesProcessed(): number {
    return this.framesProcessed;
  }
}
