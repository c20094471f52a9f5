import { AlertRecord, toAlertRecordFields } from '@hearthwatch/db';
import type { Alert, SafetyStatus } from '@hearthwatch/shared';
import type { AlertSink } from './alertSink.js';

/** Appends emitted alerts to the `alertrecords` collection. */
export class MongoAlertSink implements AlertSink {
  readonly name = 'mongo';

  async deliver(alerts: readonly Alert[], _status: SafetyStatus): Promise<void> {
    if (alerts.length === 0) return;
    await AlertRecord.insertMany(alerts.map(toAlertRecordFields));
  }
}
