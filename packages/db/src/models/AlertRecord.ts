import mongoose, { Schema, type InferSchemaType } from 'mongoose';
import { ALERT_TYPES, SEVERITIES } from '@hearthwatch/shared';
import type { Alert } from '@hearthwatch/shared';

// Append-only: records are inserted once per emitted alert and never updated.
const alertRecordSchema = new Schema(
  {
    type: { type: String, enum: [...ALERT_TYPES], required: true, index: true },
    severity: { type: String, enum: [...SEVERITIES], required: true },
    message: { type: String, required: true },
    voiceAlert: { type: String, default: '' },
    details: { type: Schema.Types.Mixed, default: {} },
    emittedAt: { type: Date, required: true, index: true },
    // null when the detector did not report a frame number
    frameNumber: { type: Number, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } },
);

export type AlertRecordDocument = InferSchemaType<typeof alertRecordSchema> & mongoose.Document;

export const AlertRecord = mongoose.model('AlertRecord', alertRecordSchema);

export function toAlertRecordFields(alert: Alert) {
  return {
    type: alert.type,
    severity: alert.severity,
    message: alert.message,
    voiceAlert: alert.voiceAlert,
    details: alert.details,
    emittedAt: new Date(alert.timestamp),
    frameNumber: alert.frameNumber === 'unknown' ? null : alert.frameNumber,
  };
}
