import type {
  Alert,
  AlertDraft,
  ClassificationFrame,
  DetectionFrame,
  SafetyConfig,
} from '@hearthwatch/shared';
import { CooldownTracker } from './cooldown.js';
import { HAZARD_RULES, runRules, type NamedRule } from './rules/index.js';

export interface EvaluateOptions {
  now?: Date;
  /** Drop alerts whose type fired within the cooldown window. Defaults to true. */
  applyCooldown?: boolean;
}

export interface SafetyCheckerOptions {
  rules?: readonly NamedRule[];
}

export function stampAlerts(
  drafts: readonly AlertDraft[],
  now: Date,
  frameNumber: number | 'unknown',
): Alert[] {
  const timestamp = now.toISOString();
  return drafts.map((draft) => ({ ...draft, timestamp, frameNumber }));
}

/**
 * Runs the hazard rules over one frame at a time and applies per-type
 * cooldown suppression. `evaluate` is synchronous and is the only code that
 * touches the cooldown state, so frames arriving through the event loop are
 * evaluated one after another.
 */
export class SafetyChecker {
  private readonly config: Readonly<SafetyConfig>;
  private readonly rules: readonly NamedRule[];
  private readonly cooldowns: CooldownTracker;

  constructor(config: SafetyConfig, options: SafetyCheckerOptions = {}) {
    this.config = Object.freeze({ ...config });
    this.rules = options.rules ?? HAZARD_RULES;
    this.cooldowns = new CooldownTracker(this.config.alertCooldownSec);
  }

  evaluate(
    frame: DetectionFrame,
    classifications: ClassificationFrame,
    options: EvaluateOptions = {},
  ): Alert[] {
    const now = options.now ?? new Date();
    const applyCooldown = options.applyCooldown ?? true;

    const drafts = runRules(frame.detections, classifications.classifications, this.config, this.rules);
    const alerts = stampAlerts(drafts, now, frame.frameNumber);
    if (!applyCooldown) return alerts;

    const nowMs = now.getTime();
    return alerts.filter((alert) => this.cooldowns.tryEmit(alert.type, nowMs));
  }

  getConfig(): Readonly<SafetyConfig> {
    return this.config;
  }

  resetCooldowns(): void {
    this.cooldowns.reset();
  }
}
