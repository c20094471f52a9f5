import fs from 'node:fs';
import type { SafetyConfig, SafetyConfigFile } from '@hearthwatch/shared';
import { ConfigError } from './errors.js';

export const DEFAULT_SAFETY_CONFIG: Readonly<SafetyConfig> = Object.freeze({
  safeDistanceThreshold: 200,
  confidenceThreshold: 0.7,
  alertCooldownSec: 5,
  knifeDangerDistance: 100,
});

interface FieldSpec {
  key: keyof SafetyConfig;
  fileKey: keyof SafetyConfigFile;
  valid: (value: number) => boolean;
  expected: string;
}

const FIELDS: readonly FieldSpec[] = [
  {
    key: 'safeDistanceThreshold',
    fileKey: 'safe_distance_threshold',
    valid: (v) => v > 0,
    expected: 'a positive number of pixels',
  },
  {
    key: 'confidenceThreshold',
    fileKey: 'confidence_threshold',
    valid: (v) => v >= 0 && v <= 1,
    expected: 'a number in [0, 1]',
  },
  {
    key: 'alertCooldownSec',
    fileKey: 'alert_cooldown',
    valid: (v) => v >= 0,
    expected: 'a non-negative number of seconds',
  },
  {
    key: 'knifeDangerDistance',
    fileKey: 'knife_danger_distance',
    valid: (v) => v > 0,
    expected: 'a positive number of pixels',
  },
];

/** Merges the recognised file keys over the defaults. Unknown keys are ignored. */
export function parseSafetyConfig(raw: unknown): Readonly<SafetyConfig> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Safety config must be a JSON object');
  }

  const config: SafetyConfig = { ...DEFAULT_SAFETY_CONFIG };
  for (const field of FIELDS) {
    const value: unknown = Reflect.get(raw, field.fileKey);
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value) || !field.valid(value)) {
      throw new ConfigError(`${field.fileKey} must be ${field.expected}, got ${JSON.stringify(value)}`);
    }
    config[field.key] = value;
  }
  return Object.freeze(config);
}

export function loadSafetyConfig(filePath?: string): Readonly<SafetyConfig> {
  if (!filePath) return DEFAULT_SAFETY_CONFIG;

  if (!fs.existsSync(filePath)) {
    console.warn(`[config] ${filePath} not found, using default safety thresholds`);
    return DEFAULT_SAFETY_CONFIG;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not parse ${filePath}: ${message}`);
  }
  return parseSafetyConfig(raw);
}

export function toSafetyConfigFile(config: SafetyConfig): SafetyConfigFile {
  return {
    safe_distance_threshold: config.safeDistanceThreshold,
    confidence_threshold: config.confidenceThreshold,
    alert_cooldown: config.alertCooldownSec,
    knife_danger_distance: config.knifeDangerDistance,
  };
}
