import { SEVERITY_RANK } from '@hearthwatch/shared';
import type {
  AlertDraft,
  KitchenStatus,
  SafetyStatus,
  Severity,
  StatusColor,
} from '@hearthwatch/shared';

const STATUS_BY_SEVERITY: Record<Severity, { status: KitchenStatus; color: StatusColor }> = {
  CRITICAL: { status: 'EMERGENCY', color: 'red' },
  HIGH: { status: 'DANGER', color: 'orange' },
  MEDIUM: { status: 'WARNING', color: 'yellow' },
  LOW: { status: 'CAUTION', color: 'blue' },
};

export const SAFE_STATUS: SafetyStatus = {
  status: 'SAFE',
  message: 'Kitchen is safe! All clear.',
  color: 'green',
  alertCount: 0,
  topAlertType: null,
};

export function overallStatus(alerts: readonly AlertDraft[]): SafetyStatus {
  let top: AlertDraft | undefined;
  for (const alert of alerts) {
    // Strict comparison keeps the earliest alert on ties (rule order).
    if (!top || SEVERITY_RANK[alert.severity] > SEVERITY_RANK[top.severity]) {
      top = alert;
    }
  }
  if (!top) return SAFE_STATUS;

  const { status, color } = STATUS_BY_SEVERITY[top.severity];
  return {
    status,
    message: top.message,
    color,
    alertCount: alerts.length,
    topAlertType: top.type,
  };
}
