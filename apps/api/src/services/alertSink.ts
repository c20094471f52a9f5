import type { Alert, SafetyStatus } from '@hearthwatch/shared';

/** Receives the alerts that survived cooldown for one frame. */
export interface AlertSink {
  readonly name: string;
  deliver(alerts: readonly Alert[], status: SafetyStatus): Promise<void>;
}
