import { OBJECT_CLASSES } from '@hearthwatch/shared';
import type {
  BoundingBox,
  Classification,
  ClassificationFrame,
  Detection,
  DetectionFrame,
  FeatureValue,
  KnownObjectClass,
  ObjectClass,
  Point,
} from '@hearthwatch/shared';
import { cropKey } from './detectionIndex.js';
import { InvalidFrameError } from './errors.js';
import { centerOf } from './geometry.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: InvalidFrameError };

// Labels some detector builds emit for classes in the vocabulary.
const CLASS_ALIASES: Readonly<Record<string, KnownObjectClass>> = {
  flame: 'fire',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isProbability(value: unknown): value is number {
  return isFiniteNumber(value) && value >= 0 && value <= 1;
}

function isKnownClass(label: string): label is KnownObjectClass {
  return OBJECT_CLASSES.some((known) => known === label);
}

export function toObjectClass(label: string): ObjectClass {
  const normalized = label.trim().toLowerCase();
  if (isKnownClass(normalized)) return normalized;
  return CLASS_ALIASES[normalized] ?? 'unknown';
}

function parseNumbers(value: unknown, length: number): number[] | null {
  if (!Array.isArray(value) || value.length !== length) return null;
  const numbers: number[] = [];
  for (const item of value) {
    if (!isFiniteNumber(item)) return null;
    numbers.push(Math.trunc(item));
  }
  return numbers;
}

function parseDetection(raw: unknown, path: string, issues: string[]): Detection | null {
  if (!isRecord(raw)) {
    issues.push(`${path} must be an object`);
    return null;
  }

  const startCount = issues.length;
  const { class: label, confidence, bbox, center, cropped_image_path: crop } = raw;

  if (typeof label !== 'string') issues.push(`${path}.class must be a string`);
  if (!isProbability(confidence)) issues.push(`${path}.confidence must be a number in [0, 1]`);

  const box = parseNumbers(bbox, 4);
  let boundingBox: BoundingBox | null = null;
  if (!box) {
    issues.push(`${path}.bbox must be four numbers [x1, y1, x2, y2]`);
  } else {
    const [x1, y1, x2, y2] = box;
    if (x1 > x2 || y1 > y2) {
      issues.push(`${path}.bbox must satisfy x1 <= x2 and y1 <= y2`);
    } else {
      boundingBox = [x1, y1, x2, y2];
    }
  }

  let givenCenter: Point | null = null;
  if (center !== undefined && center !== null) {
    const pair = parseNumbers(center, 2);
    if (!pair) {
      issues.push(`${path}.center must be two numbers [x, y]`);
    } else {
      givenCenter = [pair[0], pair[1]];
    }
  }

  if (crop !== undefined && crop !== null && typeof crop !== 'string') {
    issues.push(`${path}.cropped_image_path must be a string or null`);
  }

  if (
    issues.length > startCount ||
    typeof label !== 'string' ||
    !isProbability(confidence) ||
    !boundingBox
  ) {
    return null;
  }

  return {
    objectClass: toObjectClass(label),
    rawClass: label,
    confidence,
    boundingBox,
    center: givenCenter ?? centerOf(boundingBox),
    cropReference: typeof crop === 'string' && crop !== '' ? crop : null,
  };
}

export function parseDetectionBatch(raw: unknown): ParseResult<DetectionFrame> {
  const issues: string[] = [];

  if (!isRecord(raw)) {
    return { ok: false, error: new InvalidFrameError(['detection batch must be an object']) };
  }

  const { detections, frame_number: frameNumber, timestamp } = raw;

  if (frameNumber !== undefined && frameNumber !== null) {
    if (!Number.isInteger(frameNumber) || !isFiniteNumber(frameNumber) || frameNumber < 0) {
      issues.push('frame_number must be a non-negative integer');
    }
  }
  if (timestamp !== undefined && timestamp !== null && typeof timestamp !== 'string') {
    issues.push('timestamp must be a string');
  }

  const parsed: Detection[] = [];
  if (!Array.isArray(detections)) {
    issues.push('detections must be an array');
  } else {
    detections.forEach((item: unknown, index) => {
      const detection = parseDetection(item, `detections[${index}]`, issues);
      if (detection) parsed.push(detection);
    });
  }

  if (issues.length > 0) {
    return { ok: false, error: new InvalidFrameError(issues) };
  }

  return {
    ok: true,
    value: {
      frameNumber: isFiniteNumber(frameNumber) ? frameNumber : 'unknown',
      timestamp: typeof timestamp === 'string' ? timestamp : null,
      detections: parsed,
    },
  };
}

function parseFeatures(
  raw: unknown,
  path: string,
  issues: string[],
): Record<string, FeatureValue> {
  const features: Record<string, FeatureValue> = {};
  if (raw === undefined || raw === null) return features;
  if (!isRecord(raw)) {
    issues.push(`${path} must be an object`);
    return features;
  }
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'boolean' || isFiniteNumber(value)) {
      features[name] = value;
    } else {
      issues.push(`${path}.${name} must be a string, number or boolean`);
    }
  }
  return features;
}

export function parseClassificationBatch(raw: unknown): ParseResult<ClassificationFrame> {
  const issues: string[] = [];

  if (!isRecord(raw)) {
    return { ok: false, error: new InvalidFrameError(['classification batch must be an object']) };
  }

  const { classifications, timestamp } = raw;
  if (timestamp !== undefined && timestamp !== null && typeof timestamp !== 'string') {
    issues.push('timestamp must be a string');
  }

  const byCrop = new Map<string, Classification>();
  if (!isRecord(classifications)) {
    issues.push('classifications must be an object keyed by crop file name');
  } else {
    for (const [key, entry] of Object.entries(classifications)) {
      const path = `classifications[${JSON.stringify(key)}]`;
      if (!isRecord(entry)) {
        issues.push(`${path} must be an object`);
        continue;
      }
      const { status, confidence } = entry;
      if (typeof status !== 'string') issues.push(`${path}.status must be a string`);
      if (!isProbability(confidence)) issues.push(`${path}.confidence must be a number in [0, 1]`);
      const features = parseFeatures(entry.features, `${path}.features`, issues);
      if (typeof status === 'string' && isProbability(confidence)) {
        byCrop.set(cropKey(key), { status, confidence, features });
      }
    }
  }

  if (issues.length > 0) {
    return { ok: false, error: new InvalidFrameError(issues) };
  }

  return {
    ok: true,
    value: {
      timestamp: typeof timestamp === 'string' ? timestamp : null,
      classifications: byCrop,
    },
  };
}

export interface ParsedFrame {
  frame: DetectionFrame;
  classifications: ClassificationFrame;
}

/** Validates both documents; problems from either are reported together. */
export function parseFrame(rawDetections: unknown, rawClassifications: unknown): ParseResult<ParsedFrame> {
  const detections = parseDetectionBatch(rawDetections);
  const classifications = parseClassificationBatch(rawClassifications);

  if (!detections.ok || !classifications.ok) {
    const issues = [
      ...(detections.ok ? [] : detections.error.issues),
      ...(classifications.ok ? [] : classifications.error.issues),
    ];
    return { ok: false, error: new InvalidFrameError(issues) };
  }

  return {
    ok: true,
    value: { frame: detections.value, classifications: classifications.value },
  };
}
