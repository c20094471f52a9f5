export const OBJECT_CLASSES = [
  'person',
  'stove',
  'knife',
  'pan',
  'pot',
  'fire',
  'smoke',
  'oven',
] as const;

export type KnownObjectClass = (typeof OBJECT_CLASSES)[number];

/** `unknown` is what every label outside the vocabulary collapses to. */
export type ObjectClass = KnownObjectClass | 'unknown';

export type Point = readonly [x: number, y: number];

export type BoundingBox = readonly [x1: number, y1: number, x2: number, y2: number];

export type FeatureValue = string | number | boolean;

export interface Detection {
  objectClass: ObjectClass;
  /** Label as the detector emitted it, before normalization. */
  rawClass: string;
  confidence: number;
  boundingBox: BoundingBox;
  center: Point;
  cropReference: string | null;
}

export interface Classification {
  status: string;
  confidence: number;
  features: Readonly<Record<string, FeatureValue>>;
}

/** Classifications keyed by crop basename. */
export type ClassificationMap = ReadonlyMap<string, Classification>;

export interface DetectionFrame {
  frameNumber: number | 'unknown';
  timestamp: string | null;
  detections: readonly Detection[];
}

export interface ClassificationFrame {
  timestamp: string | null;
  classifications: ClassificationMap;
}

// Wire documents produced by the detector and classifier.

export interface DetectionDoc {
  class: string;
  confidence: number;
  bbox: [number, number, number, number];
  center?: [number, number];
  cropped_image_path?: string | null;
}

export interface DetectionBatchDoc {
  timestamp?: string;
  frame_number?: number;
  detections: DetectionDoc[];
}

export interface ClassificationDoc {
  status: string;
  confidence: number;
  features?: Record<string, FeatureValue>;
}

export interface ClassificationBatchDoc {
  timestamp?: string;
  classifications: Record<string, ClassificationDoc>;
}
