import type {
  Classification,
  ClassificationMap,
  Detection,
  ObjectClass,
} from '@hearthwatch/shared';

/**
 * First detection of `objectClass` in list order whose confidence clears the
 * floor. List order is the tie-break, not confidence.
 */
export function findBest(
  detections: readonly Detection[],
  objectClass: ObjectClass,
  confidenceThreshold: number,
): Detection | undefined {
  return detections.find(
    (d) => d.objectClass === objectClass && d.confidence >= confidenceThreshold,
  );
}

export function findAll(
  detections: readonly Detection[],
  objectClass: ObjectClass,
  confidenceThreshold: number,
): Detection[] {
  return detections.filter(
    (d) => d.objectClass === objectClass && d.confidence >= confidenceThreshold,
  );
}

/** Basename of a crop path; classifications are keyed by it. */
export function cropKey(reference: string): string {
  const segments = reference.split(/[\\/]/);
  return segments[segments.length - 1] ?? '';
}

export function classificationFor(
  detection: Detection,
  classifications: ClassificationMap,
): Classification | undefined {
  if (!detection.cropReference) return undefined;
  return classifications.get(cropKey(detection.cropReference));
}
