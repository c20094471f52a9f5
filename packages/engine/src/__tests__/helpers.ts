import type {
  Classification,
  ClassificationFrame,
  Detection,
  DetectionFrame,
  ObjectClass,
  Point,
} from '@hearthwatch/shared';

interface DetOptions {
  confidence?: number;
  crop?: string | null;
}

/** A detection whose box is a 20px square around `center`. */
export function det(objectClass: ObjectClass, center: Point, options: DetOptions = {}): Detection {
  const [x, y] = center;
  return {
    objectClass,
    rawClass: objectClass,
    confidence: options.confidence ?? 0.9,
    boundingBox: [x - 10, y - 10, x + 10, y + 10],
    center,
    cropReference: options.crop === undefined ? `outputs/crops/${objectClass}_001.jpg` : options.crop,
  };
}

export function state(status: string, confidence = 0.85, features: Classification['features'] = {}): Classification {
  return { status, confidence, features };
}

export function classMap(entries: Record<string, Classification>): Map<string, Classification> {
  return new Map(Object.entries(entries));
}

export function frameOf(detections: Detection[], frameNumber: number | 'unknown' = 1): DetectionFrame {
  return { frameNumber, timestamp: null, detections };
}

export function classFrameOf(entries: Record<string, Classification>): ClassificationFrame {
  return { timestamp: null, classifications: classMap(entries) };
}
