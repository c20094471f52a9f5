export type AlertType =
  | 'FIRE_DETECTED'
  | 'SMOKE_DETECTED'
  | 'STOVE_UNATTENDED'
  | 'STOVE_TOO_FAR'
  | 'KNIFE_UNATTENDED'
  | 'PAN_OVERHEATING';

export const ALERT_TYPES: readonly AlertType[] = [
  'FIRE_DETECTED',
  'SMOKE_DETECTED',
  'STOVE_UNATTENDED',
  'STOVE_TOO_FAR',
  'KNIFE_UNATTENDED',
  'PAN_OVERHEATING',
];

export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export const SEVERITIES: readonly Severity[] = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'];

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  CRITICAL: 4,
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
};

export type AlertDetailValue =
  | string
  | number
  | boolean
  | null
  | readonly number[]
  | Readonly<Record<string, string | number | boolean>>;

export type AlertDetails = Readonly<Record<string, AlertDetailValue>>;

/** What a hazard rule produces; the orchestrator adds the frame stamp. */
export interface AlertDraft {
  readonly type: AlertType;
  readonly severity: Severity;
  readonly message: string;
  readonly voiceAlert: string;
  readonly details: AlertDetails;
}

export interface Alert extends AlertDraft {
  readonly timestamp: string;
  readonly frameNumber: number | 'unknown';
}

/** Serialized alert as written to logs, HTTP responses and sockets. */
export interface AlertJson {
  type: AlertType;
  severity: Severity;
  message: string;
  voice_alert: string;
  details: AlertDetails;
  timestamp: string;
  frame_number: number | 'unknown';
}

export function toAlertJson(alert: Alert): AlertJson {
  return {
    type: alert.type,
    severity: alert.severity,
    message: alert.message,
    voice_alert: alert.voiceAlert,
    details: alert.details,
    timestamp: alert.timestamp,
    frame_number: alert.frameNumber,
  };
}

export type KitchenStatus = 'SAFE' | 'EMERGENCY' | 'DANGER' | 'WARNING' | 'CAUTION';

export type StatusColor = 'green' | 'red' | 'orange' | 'yellow' | 'blue';

export interface SafetyStatus {
  status: KitchenStatus;
  message: string;
  color: StatusColor;
  alertCount: number;
  topAlertType: AlertType | null;
}

export interface AlertSummary {
  date: string;
  total: number;
  byType: Partial<Record<AlertType, number>>;
  bySeverity: Partial<Record<Severity, number>>;
}

export interface AlertListResponse {
  alerts: AlertJson[];
  total: number;
}
