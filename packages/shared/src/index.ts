import type { AlertJson, SafetyStatus } from './types/alert.js';

export interface HealthResponse {
  status: 'ok';
  service: string;
  timestamp: string;
  version: string;
}

export type WsMessageType = 'alerts:batch';

export interface WsMessage {
  type: WsMessageType;
  frameNumber: number | 'unknown';
  data: WsAlertBatch;
}

export interface WsAlertBatch {
  alerts: AlertJson[];
  status: SafetyStatus;
}

export interface EvaluateFrameRequest {
  detections: unknown;
  classifications: unknown;
}

export interface EvaluateFrameResponse {
  frameNumber: number | 'unknown';
  alerts: AlertJson[];
  status: SafetyStatus;
}

export interface InvalidFrameResponse {
  error: string;
  issues: string[];
}

export const APP_VERSION = '0.1.0';

export * from './types/detection.js';
export * from './types/alert.js';
export * from './types/config.js';
